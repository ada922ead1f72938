// Indexer for Memsift
// Full scan-and-replace: every rebuild writes a fresh staging store and swaps it over the active one.

import fs from 'node:fs/promises'
import path from 'node:path'
import { IndexStore } from './db.js'
import { defaultExtractor } from './extractor.js'
import { FileReadError } from './errors.js'
import { acquireRebuildLock } from './lock.js'
import { DEFAULT_EXTENSIONS, listDocumentFiles, readUtf8 } from './utils.js'
import type { MetadataExtractor } from './extractor.js'
import type { IndexBuildResult, IndexedRecord, IndexWarning, MemsiftLogger, MemsiftPaths } from './types.js'

export type RebuildOptions = {
    extractor?: MetadataExtractor
    extensions?: readonly string[]
    logger?: MemsiftLogger
}

export function stagingPathFor(dbPath: string): string {
    return `${dbPath}.staging`
}

async function removeStaging(stagingPath: string): Promise<void> {
    await fs.rm(stagingPath, { force: true })
    await fs.rm(`${stagingPath}-journal`, { force: true })
}

async function collectRecords(
    files: string[],
    extractor: MetadataExtractor,
    warn: (error: FileReadError) => void
): Promise<IndexedRecord[]> {
    const records: IndexedRecord[] = []

    for (const filePath of files) {
        let content: string
        try {
            content = await readUtf8(filePath)
        } catch (cause) {
            warn(new FileReadError(filePath, cause))
            continue
        }
        records.push({ path: filePath, content, ...extractor.extract(content, path.basename(filePath)) })
    }

    return records
}

/**
 * Rebuild the index from every document under `paths.memoryDir`.
 *
 * Holds the rebuild lock for the whole run. Readers keep seeing the previous
 * store until the rename; on failure the previous store is left as it was.
 */
export async function rebuildIndex(paths: MemsiftPaths, options: RebuildOptions = {}): Promise<IndexBuildResult> {
    const extractor = options.extractor ?? defaultExtractor
    const logger = options.logger ?? console

    await fs.mkdir(path.dirname(paths.dbPath), { recursive: true })
    const release = acquireRebuildLock(paths.lockPath)
    const stagingPath = stagingPathFor(paths.dbPath)

    const warnings: IndexWarning[] = []
    const warn = (error: FileReadError): void => {
        logger.warn(`Warning: ${error.message}`)
        warnings.push({ path: error.path, error: error.message })
    }

    try {
        await removeStaging(stagingPath)

        const files = await listDocumentFiles(
            paths.memoryDir,
            options.extensions ?? DEFAULT_EXTENSIONS,
            (entryPath, cause) => warn(new FileReadError(entryPath, cause))
        )
        const records = await collectRecords(files, extractor, warn)

        try {
            const store = new IndexStore(stagingPath)
            try {
                store.initialize()
                store.clearAll()
                store.insertMany(records)
            } finally {
                store.close()
            }
            await fs.rename(stagingPath, paths.dbPath)
        } catch (error) {
            await removeStaging(stagingPath)
            throw error
        }

        return {
            memoryDir: paths.memoryDir,
            dbPath: paths.dbPath,
            indexed: records.length,
            warnings
        }
    } finally {
        release()
    }
}
