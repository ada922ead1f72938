// Core types for Memsift
// Centralised type definitions shared between core modules, CLI, and HTTP server

export type MemsiftPaths = {
    memoryDir: string
    dbPath: string
    lockPath: string
}

export type DocumentMetadata = {
    date_created: string
    tags: string
    summary: string
}

/** One row of the full-text index. Rebuilt wholesale, never updated in place. */
export type IndexedRecord = DocumentMetadata & {
    path: string
    content: string
}

export type HighlightOptions = {
    open?: string
    close?: string
    ellipsis?: string
    /** Tokens of context per snippet (FTS5 accepts 1–64) */
    tokens?: number
}

export type RankedRecord = {
    path: string
    date_created: string
    tags: string
    summary: string
    snippet: string
    rank: number
}

export type SearchHit = {
    file: string
    date: string
    snippet: string
    tags: string
    path: string
}

export type TimelineEntry = {
    file: string
    date: string
    path: string
}

export type TimelineOptions = {
    date?: string
}

export type IndexWarning = {
    path: string
    error: string
}

export type IndexBuildResult = {
    memoryDir: string
    dbPath: string
    indexed: number
    warnings: IndexWarning[]
}

export type ContentFailure = {
    path: string
    error: string
}

export type ContentBatch = {
    contents: Record<string, string>
    failed: ContentFailure[]
}

export type MemsiftLogger = {
    warn(message: string): void
}

// ─── Runtime API types ───────────────────────────────────────────────────────

/** Standard envelope for all MemsiftCore API responses */
export type MemsiftResult<T> = {
    ok: boolean
    data?: T
    error?: string
    code?: string
    meta: {
        source: string       // 'sqlite' | 'filesystem'
        warnings?: string[]  // per-file problems that did not fail the call
        timestamp: string    // ISO8601
        latency_ms: number   // end-to-end operation time
    }
}

export type HealthStatus = {
    ok: boolean
    memoryDir: string
    dbPath: string
    index: 'ok' | 'missing' | 'error'
    records: number
    rebuilding: boolean
}
