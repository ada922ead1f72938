// Path resolution for Memsift
// Resolves the document root and the store/lock paths derived from it

import os from 'node:os'
import path from 'node:path'
import { existsSync as fsExistsSync } from 'node:fs'
import type { MemsiftPaths } from './types.js'

export const INDEX_FILENAME = 'search_index.db'

export function existsSync(targetPath: string): boolean {
    return fsExistsSync(targetPath)
}

/** Fallback search order used when no explicit document root is given. */
export function defaultCandidates(cwd: string = process.cwd(), home: string = os.homedir()): string[] {
    return [path.join(cwd, 'memory'), path.join(home, '.memsift', 'memory'), cwd]
}

export function resolveMemoryDir(options: {
    override?: string
    candidates?: string[]
    exists?: (candidate: string) => boolean
} = {}): string {
    const override = options.override?.trim()
    if (override) return path.resolve(override)

    const candidates = options.candidates ?? defaultCandidates()
    const exists = options.exists ?? existsSync
    const found = candidates.find((c) => exists(c))
    if (found) return path.resolve(found)

    const last = candidates.at(-1)
    return path.resolve(last ?? process.cwd())
}

function resolvePathFromEnv(raw: string | undefined): string | undefined {
    if (!raw || !raw.trim()) return undefined
    return path.resolve(raw)
}

export function resolveMemsiftPaths(memoryDirOverride?: string): MemsiftPaths {
    const memoryDir = resolveMemoryDir({ override: memoryDirOverride ?? process.env.MEMSIFT_DIR })
    const dbPath = resolvePathFromEnv(process.env.MEMSIFT_DB_PATH) ?? path.join(memoryDir, INDEX_FILENAME)

    return {
        memoryDir,
        dbPath,
        lockPath: `${dbPath}.lock`
    }
}
