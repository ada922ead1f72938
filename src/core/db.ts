// Index store for Memsift
// SQLite FTS5 table via better-sqlite3: schema, wholesale writes, ranked queries with snippets

import Database from 'better-sqlite3'
import { z } from 'zod'
import { existsSync } from './paths.js'
import { QueryError, RecordError, StoreInitError, describeError } from './errors.js'
import type { HighlightOptions, IndexedRecord, RankedRecord } from './types.js'

export const FTS_TABLE = 'memory_fts'

export const DEFAULT_HIGHLIGHT: Required<HighlightOptions> = {
    open: '<mark>',
    close: '</mark>',
    ellipsis: '...',
    tokens: 15
}

const indexedRecordSchema = z.object({
    path: z.string().min(1),
    content: z.string(),
    date_created: z.string().min(1),
    tags: z.string(),
    summary: z.string()
})

/**
 * Turn free text into an FTS5 expression: every word token quoted, implicitly ANDed.
 * Operators and punctuation in the input are never interpreted.
 *
 * @returns null when the text has no searchable tokens
 */
export function buildFtsQuery(raw: string): string | null {
    const tokens = raw.match(/[\p{L}\p{N}]+/gu) ?? []
    if (tokens.length === 0) return null
    return tokens.map((t) => `"${t}"`).join(' ')
}

function assertLimit(limit: number): void {
    if (!Number.isInteger(limit) || limit < 1) {
        throw new QueryError(`Invalid limit: expected positive integer, got ${limit}`)
    }
}

function resolveHighlight(options?: HighlightOptions): Required<HighlightOptions> {
    const merged = { ...DEFAULT_HIGHLIGHT, ...options }
    if (!Number.isInteger(merged.tokens) || merged.tokens < 1 || merged.tokens > 64) {
        throw new QueryError(`Invalid snippet window: expected 1-64 tokens, got ${merged.tokens}`)
    }
    return merged
}

function openDatabase(dbPath: string, readonly: boolean): Database.Database {
    try {
        return new Database(dbPath, { readonly, fileMustExist: readonly })
    } catch (error) {
        throw new StoreInitError(dbPath, error)
    }
}

export class IndexStore {
    readonly dbPath: string
    private readonly db: Database.Database

    constructor(dbPath: string, options: { readonly?: boolean } = {}) {
        this.dbPath = dbPath
        this.db = openDatabase(dbPath, options.readonly ?? false)
    }

    /** Create the FTS schema if it is missing. Existing rows are kept. */
    initialize(): void {
        try {
            this.db.exec(`
        CREATE VIRTUAL TABLE IF NOT EXISTS ${FTS_TABLE} USING fts5(
          path UNINDEXED,
          content,
          date_created UNINDEXED,
          tags,
          summary
        );
      `)
        } catch (error) {
            throw new StoreInitError(this.dbPath, error)
        }
    }

    clearAll(): void {
        this.db.exec(`DELETE FROM ${FTS_TABLE}`)
    }

    insert(record: Partial<IndexedRecord>): void {
        const parsed = indexedRecordSchema.safeParse(record)
        if (!parsed.success) {
            const details = parsed.error.issues
                .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
                .join('; ')
            throw new RecordError(`Invalid record${record.path ? ` ${record.path}` : ''}: ${details}`)
        }

        const r = parsed.data
        this.db
            .prepare(`INSERT INTO ${FTS_TABLE} (path, content, date_created, tags, summary) VALUES (?, ?, ?, ?, ?)`)
            .run(r.path, r.content, r.date_created, r.tags, r.summary)
    }

    /** Insert every record in one transaction; a failing record rolls back the whole batch. */
    insertMany(records: Iterable<Partial<IndexedRecord>>): number {
        let inserted = 0
        const run = this.db.transaction((rows: Iterable<Partial<IndexedRecord>>) => {
            for (const row of rows) {
                this.insert(row)
                inserted += 1
            }
        })
        run(records)
        return inserted
    }

    count(): number {
        const row = this.db.prepare(`SELECT COUNT(*) AS c FROM ${FTS_TABLE}`).get() as { c: number }
        return Number(row.c)
    }

    listRecords(): IndexedRecord[] {
        return this.db
            .prepare(`SELECT path, content, date_created, tags, summary FROM ${FTS_TABLE} ORDER BY path ASC`)
            .all() as IndexedRecord[]
    }

    /**
     * Rank records by BM25 relevance (best first, ties broken by path) and attach a
     * highlighted snippet of the content column.
     */
    query(text: string, limit: number, highlight?: HighlightOptions): RankedRecord[] {
        assertLimit(limit)
        const ftsQuery = buildFtsQuery(text)
        if (!ftsQuery) {
            throw new QueryError(`Query has no searchable terms: '${text}'`)
        }
        const h = resolveHighlight(highlight)

        try {
            return this.db
                .prepare(`
          SELECT path, date_created, tags, summary,
                 snippet(${FTS_TABLE}, 1, ?, ?, ?, ?) AS snippet,
                 rank
          FROM ${FTS_TABLE}
          WHERE ${FTS_TABLE} MATCH ?
          ORDER BY rank ASC, path ASC
          LIMIT ?
        `)
                .all(h.open, h.close, h.ellipsis, h.tokens, ftsQuery, limit) as RankedRecord[]
        } catch (error) {
            throw new QueryError(`Query failed for '${text}': ${describeError(error)}`, { cause: error })
        }
    }

    close(): void {
        this.db.close()
    }
}

export function withIndexStore<T>(
    dbPath: string,
    options: { readonly?: boolean },
    fn: (store: IndexStore) => T
): T {
    const store = new IndexStore(dbPath, options)
    try {
        return fn(store)
    } finally {
        store.close()
    }
}

// ─── Init ────────────────────────────────────────────────────────────────────

export function initIndexStore(dbPath: string): void {
    withIndexStore(dbPath, {}, (store) => store.initialize())
}

// ─── Query ───────────────────────────────────────────────────────────────────

/** Query the active store. A store that was never built yields no records. */
export function queryIndex(
    dbPath: string,
    text: string,
    limit: number,
    highlight?: HighlightOptions
): RankedRecord[] {
    assertLimit(limit)
    if (!buildFtsQuery(text)) {
        throw new QueryError(`Query has no searchable terms: '${text}'`)
    }
    resolveHighlight(highlight)
    if (!existsSync(dbPath)) return []
    return withIndexStore(dbPath, { readonly: true }, (store) => store.query(text, limit, highlight))
}

export function countIndexed(dbPath: string): number {
    if (!existsSync(dbPath)) return 0
    return withIndexStore(dbPath, { readonly: true }, (store) => store.count())
}
