// Core module public API
// Import from here when consuming MemsiftCore in the CLI or HTTP server.

export { MemsiftCore } from './memsift.js'
export type { MemsiftCoreOptions } from './memsift.js'
export { resolveMemsiftPaths, resolveMemoryDir, defaultCandidates, existsSync, INDEX_FILENAME } from './paths.js'
export { IndexStore, initIndexStore, queryIndex, countIndexed, buildFtsQuery, DEFAULT_HIGHLIGHT } from './db.js'
export { rebuildIndex } from './indexer.js'
export type { RebuildOptions } from './indexer.js'
export { searchIndex, DEFAULT_SEARCH_LIMIT } from './search.js'
export { buildTimeline } from './timeline.js'
export { readContents, readContent } from './content.js'
export { RegexMetadataExtractor, defaultExtractor, extractTags, extractSummary } from './extractor.js'
export type { MetadataExtractor } from './extractor.js'
export {
    MemsiftError, FileReadError, StoreInitError, RecordError,
    QueryError, NotFoundError, IndexLockError
} from './errors.js'
export { extractDate, listDocumentFiles, UNKNOWN_DATE } from './utils.js'
export type {
    MemsiftPaths, DocumentMetadata, IndexedRecord, HighlightOptions,
    RankedRecord, SearchHit, TimelineEntry, TimelineOptions,
    IndexWarning, IndexBuildResult, ContentBatch, ContentFailure,
    MemsiftLogger, MemsiftResult, HealthStatus
} from './types.js'
