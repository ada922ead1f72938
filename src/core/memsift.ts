// MemsiftCore – the central API class
// Provides: index(), search(), timeline(), get(), health()
// All methods return MemsiftResult<T>; failures are reported in the envelope, never thrown.

import fs from 'node:fs/promises'
import path from 'node:path'
import { countIndexed, initIndexStore } from './db.js'
import { describeError, errorCode } from './errors.js'
import { rebuildIndex } from './indexer.js'
import { isLocked } from './lock.js'
import { existsSync } from './paths.js'
import { readContents } from './content.js'
import { DEFAULT_SEARCH_LIMIT, searchIndex } from './search.js'
import { buildTimeline } from './timeline.js'
import { DEFAULT_EXTENSIONS } from './utils.js'
import type { MetadataExtractor } from './extractor.js'
import type {
    ContentBatch,
    HealthStatus,
    HighlightOptions,
    IndexBuildResult,
    MemsiftLogger,
    MemsiftPaths,
    MemsiftResult,
    SearchHit,
    TimelineEntry,
    TimelineOptions
} from './types.js'

export type MemsiftCoreOptions = {
    extractor?: MetadataExtractor
    extensions?: readonly string[]
    highlight?: HighlightOptions
    logger?: MemsiftLogger
}

export class MemsiftCore {
    readonly paths: MemsiftPaths
    private readonly options: MemsiftCoreOptions

    constructor(paths: MemsiftPaths, options: MemsiftCoreOptions = {}) {
        this.paths = paths
        this.options = options
    }

    private get extensions(): readonly string[] {
        return this.options.extensions ?? DEFAULT_EXTENSIONS
    }

    private succeed<T>(source: string, start: number, data: T, warnings?: string[]): MemsiftResult<T> {
        return {
            ok: true,
            data,
            meta: {
                source,
                ...(warnings && warnings.length > 0 ? { warnings } : {}),
                timestamp: new Date().toISOString(),
                latency_ms: Date.now() - start
            }
        }
    }

    private fail(source: string, start: number, error: unknown): MemsiftResult<never> {
        const code = errorCode(error)
        return {
            ok: false,
            error: describeError(error),
            ...(code ? { code } : {}),
            meta: {
                source,
                timestamp: new Date().toISOString(),
                latency_ms: Date.now() - start
            }
        }
    }

    // ─── Init ────────────────────────────────────────────────────────────────

    /** Create the document root and an empty store. Safe on every start; keeps existing records. */
    async init(): Promise<void> {
        await fs.mkdir(this.paths.memoryDir, { recursive: true })
        await fs.mkdir(path.dirname(this.paths.dbPath), { recursive: true })
        initIndexStore(this.paths.dbPath)
    }

    // ─── index() ─────────────────────────────────────────────────────────────

    async index(): Promise<MemsiftResult<IndexBuildResult>> {
        const start = Date.now()
        try {
            const result = await rebuildIndex(this.paths, {
                extractor: this.options.extractor,
                extensions: this.extensions,
                logger: this.options.logger
            })
            return this.succeed('sqlite', start, result, result.warnings.map((w) => w.error))
        } catch (error) {
            return this.fail('sqlite', start, error)
        }
    }

    // ─── search() ────────────────────────────────────────────────────────────

    async search(query: string, limit: number = DEFAULT_SEARCH_LIMIT): Promise<MemsiftResult<SearchHit[]>> {
        const start = Date.now()
        try {
            const hits = searchIndex(this.paths.dbPath, query, limit, this.options.highlight)
            return this.succeed('sqlite', start, hits)
        } catch (error) {
            return this.fail('sqlite', start, error)
        }
    }

    // ─── timeline() ──────────────────────────────────────────────────────────

    async timeline(options: TimelineOptions = {}): Promise<MemsiftResult<TimelineEntry[]>> {
        const start = Date.now()
        try {
            const entries = await buildTimeline(this.paths.memoryDir, options, {
                extensions: this.extensions,
                logger: this.options.logger
            })
            return this.succeed('filesystem', start, entries)
        } catch (error) {
            return this.fail('filesystem', start, error)
        }
    }

    // ─── get() ───────────────────────────────────────────────────────────────

    /** Partial failures keep the readable contents in `data` and list the rest in `data.failed`. */
    async get(paths: string[]): Promise<MemsiftResult<ContentBatch>> {
        const start = Date.now()
        try {
            const batch = await readContents(paths, this.paths.memoryDir)
            if (batch.failed.length === 0) return this.succeed('filesystem', start, batch)

            const failure = this.fail('filesystem', start, batch.failed.map((f) => f.error).join('; '))
            return { ...failure, data: batch, code: 'NOT_FOUND' }
        } catch (error) {
            return this.fail('filesystem', start, error)
        }
    }

    // ─── health() ────────────────────────────────────────────────────────────

    async health(): Promise<MemsiftResult<HealthStatus>> {
        const start = Date.now()
        const status: HealthStatus = {
            ok: existsSync(this.paths.memoryDir),
            memoryDir: this.paths.memoryDir,
            dbPath: this.paths.dbPath,
            index: 'missing',
            records: 0,
            rebuilding: false
        }
        try {
            status.rebuilding = isLocked(this.paths.lockPath)
            if (existsSync(this.paths.dbPath)) {
                try {
                    status.records = countIndexed(this.paths.dbPath)
                    status.index = 'ok'
                } catch (error) {
                    status.index = 'error'
                    status.ok = false
                    return this.succeed('sqlite', start, status, [describeError(error)])
                }
            }
            return this.succeed('sqlite', start, status)
        } catch (error) {
            return this.fail('sqlite', start, error)
        }
    }
}
