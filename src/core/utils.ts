// Utility helpers for Memsift
// File enumeration, decoding and string helpers shared by the indexer, timeline and content accessor

import fs from 'node:fs/promises'
import path from 'node:path'
import type { Dirent } from 'node:fs'
import { existsSync } from './paths.js'

export const DEFAULT_EXTENSIONS = ['.md']
export const UNKNOWN_DATE = 'unknown'

const DATE_PATTERN = /\d{4}-\d{2}-\d{2}/

export function extractDate(filename: string): string {
    return DATE_PATTERN.exec(path.basename(filename))?.[0] ?? UNKNOWN_DATE
}

export function isDocumentFile(name: string, extensions: readonly string[] = DEFAULT_EXTENSIONS): boolean {
    if (name.startsWith('.')) return false
    const ext = path.extname(name).toLowerCase()
    return extensions.includes(ext)
}

/** Called for a directory or link that cannot be read; the walk continues past it. */
export type WalkErrorHandler = (entryPath: string, cause: unknown) => void

type EntryKind = 'file' | 'directory' | 'other'

async function entryKind(fullPath: string, entry: Dirent): Promise<EntryKind> {
    if (entry.isSymbolicLink()) {
        const stats = await fs.stat(fullPath)
        if (stats.isDirectory()) return 'directory'
        return stats.isFile() ? 'file' : 'other'
    }
    if (entry.isDirectory()) return 'directory'
    return entry.isFile() ? 'file' : 'other'
}

/**
 * Recursively collect document files under `dirPath`, sorted by full path.
 * Hidden files are skipped; directories are walked regardless of their name.
 * Symlinks are followed, each real directory is visited once.
 *
 * Without `onError` the first unreadable entry rejects the walk.
 */
export async function listDocumentFiles(
    dirPath: string,
    extensions: readonly string[] = DEFAULT_EXTENSIONS,
    onError?: WalkErrorHandler
): Promise<string[]> {
    if (!existsSync(dirPath)) return []
    const files: string[] = []
    const visited = new Set<string>()

    function report(entryPath: string, cause: unknown): void {
        if (!onError) throw cause
        onError(entryPath, cause)
    }

    async function walk(current: string): Promise<void> {
        let entries: Dirent[]
        try {
            const real = await fs.realpath(current)
            if (visited.has(real)) return
            visited.add(real)
            entries = await fs.readdir(current, { withFileTypes: true })
        } catch (cause) {
            report(current, cause)
            return
        }

        for (const entry of entries) {
            const fullPath = path.join(current, entry.name)
            let kind: EntryKind
            try {
                kind = await entryKind(fullPath, entry)
            } catch (cause) {
                report(fullPath, cause)
                continue
            }
            if (kind === 'directory') {
                await walk(fullPath)
            } else if (kind === 'file' && isDocumentFile(entry.name, extensions)) {
                files.push(fullPath)
            }
        }
    }

    await walk(dirPath)
    return files.sort(comparePaths)
}

export function comparePaths(a: string, b: string): number {
    if (a < b) return -1
    if (a > b) return 1
    return 0
}

const utf8 = new TextDecoder('utf-8', { fatal: true })

/** Read a file as UTF-8, rejecting invalid byte sequences instead of substituting them. */
export async function readUtf8(filePath: string): Promise<string> {
    const bytes = await fs.readFile(filePath)
    return utf8.decode(bytes)
}

export function truncateUtf16Safe(input: string, maxChars: number): string {
    if (input.length <= maxChars) return input
    const cut = input.slice(0, maxChars)
    const last = cut.charCodeAt(cut.length - 1)
    // drop a dangling high surrogate
    return last >= 0xd800 && last <= 0xdbff ? cut.slice(0, -1) : cut
}
