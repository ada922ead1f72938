// Shared test utilities for Memsift tests
// Every test gets its own document root under the OS temp dir.

import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import type { MemsiftLogger, MemsiftPaths } from '../core/index.js'

export async function createTempMemoryDir(prefix = 'memsift-test-'): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix))
}

export async function removeDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true })
}

/** Write a document, creating parent directories. Returns its absolute path. */
export async function writeDoc(dir: string, relPath: string, content: string | Buffer): Promise<string> {
    const filePath = path.join(dir, relPath)
    await fs.mkdir(path.dirname(filePath), { recursive: true })
    await fs.writeFile(filePath, content)
    return filePath
}

export function pathsFor(dir: string): MemsiftPaths {
    const dbPath = path.join(dir, 'search_index.db')
    return { memoryDir: dir, dbPath, lockPath: `${dbPath}.lock` }
}

export function createRecordingLogger(): MemsiftLogger & { messages: string[] } {
    const messages: string[] = []
    return {
        messages,
        warn: (message: string) => {
            messages.push(message)
        }
    }
}

/** `# ` followed by bytes that are not valid UTF-8 */
export const INVALID_UTF8 = Buffer.from([0x23, 0x20, 0xff, 0xfe, 0xfd, 0x0a])
