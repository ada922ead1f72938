// Error taxonomy for Memsift
// Every failure surfaced by the core carries a stable `code` the CLI and HTTP server report.

export class MemsiftError extends Error {
    readonly code: string

    constructor(code: string, message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.code = code
        this.name = 'MemsiftError'
    }
}

/** A document could not be read or decoded. Recovered during rebuild: the file is skipped. */
export class FileReadError extends MemsiftError {
    readonly path: string

    constructor(filePath: string, cause: unknown) {
        super('FILE_READ_ERROR', `Cannot read ${filePath}: ${describeError(cause)}`, { cause })
        this.name = 'FileReadError'
        this.path = filePath
    }
}

export class StoreInitError extends MemsiftError {
    readonly dbPath: string

    constructor(dbPath: string, cause: unknown) {
        super('STORE_INIT_ERROR', `Cannot open index store ${dbPath}: ${describeError(cause)}`, { cause })
        this.name = 'StoreInitError'
        this.dbPath = dbPath
    }
}

export class RecordError extends MemsiftError {
    constructor(message: string) {
        super('RECORD_ERROR', message)
        this.name = 'RecordError'
    }
}

export class QueryError extends MemsiftError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('QUERY_ERROR', message, options)
        this.name = 'QueryError'
    }
}

export class NotFoundError extends MemsiftError {
    readonly path: string

    constructor(filePath: string, cause?: unknown) {
        super(
            'NOT_FOUND',
            cause === undefined ? `Not found: ${filePath}` : `Not found: ${filePath} (${describeError(cause)})`,
            { cause }
        )
        this.name = 'NotFoundError'
        this.path = filePath
    }
}

export class IndexLockError extends MemsiftError {
    readonly pid: number

    constructor(lockPath: string, pid: number) {
        super('INDEX_LOCKED', `Another rebuild (pid ${pid}) holds ${lockPath}`)
        this.name = 'IndexLockError'
        this.pid = pid
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error)
}

export function errorCode(error: unknown): string | undefined {
    return error instanceof MemsiftError ? error.code : undefined
}

/** errno-style code (`ENOENT`, `EEXIST`, ...) of a Node.js system error */
export function systemErrorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code
    }
    return undefined
}
