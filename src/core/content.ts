// Content accessor for Memsift
// Layer 3: full raw text per path; one bad path never loses the others

import path from 'node:path'
import { NotFoundError, describeError, systemErrorCode } from './errors.js'
import { existsSync } from './paths.js'
import { readUtf8 } from './utils.js'
import type { ContentBatch } from './types.js'

/** Relative paths are tried against the working directory, then the document root. */
export function resolveContentPath(raw: string, memoryDir: string): string {
    if (path.isAbsolute(raw)) return raw
    const fromCwd = path.resolve(raw)
    if (existsSync(fromCwd)) return fromCwd
    return path.resolve(memoryDir, raw)
}

export async function readContent(raw: string, memoryDir: string): Promise<string> {
    const target = resolveContentPath(raw, memoryDir)
    try {
        return await readUtf8(target)
    } catch (error) {
        throw new NotFoundError(raw, systemErrorCode(error) === 'ENOENT' ? undefined : describeError(error))
    }
}

export async function readContents(paths: string[], memoryDir: string): Promise<ContentBatch> {
    const batch: ContentBatch = { contents: {}, failed: [] }

    for (const raw of paths) {
        try {
            batch.contents[path.basename(raw)] = await readContent(raw, memoryDir)
        } catch (error) {
            if (!(error instanceof NotFoundError)) throw error
            batch.failed.push({ path: raw, error: error.message })
        }
    }

    return batch
}
