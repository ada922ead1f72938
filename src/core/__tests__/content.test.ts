import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import path from 'node:path'
import { readContent, readContents } from '../content.js'
import { NotFoundError } from '../errors.js'
import { INVALID_UTF8, createTempMemoryDir, removeDir, writeDoc } from '../../__tests__/helpers.js'

describe('content accessor', () => {
    let dir: string

    beforeEach(async () => {
        dir = await createTempMemoryDir()
    })

    afterEach(async () => {
        await removeDir(dir)
    })

    it('returns the exact content keyed by basename', async () => {
        const p = await writeDoc(dir, 'sub/hello.md', 'hello world')

        expect(await readContents([p], dir)).toEqual({ contents: { 'hello.md': 'hello world' }, failed: [] })
    })

    it('resolves relative paths against the memory dir', async () => {
        await writeDoc(dir, '2026-02-01.md', 'day note')

        expect(await readContent('2026-02-01.md', dir)).toBe('day note')
    })

    it('throws NotFoundError for a missing path', async () => {
        const missing = path.join(dir, 'missing.md')

        await expect(readContent(missing, dir)).rejects.toThrow(NotFoundError)
        await expect(readContent(missing, dir)).rejects.toThrow(`Not found: ${missing}`)
    })

    it('reports failed paths without losing the others', async () => {
        const good = await writeDoc(dir, 'good.md', 'ok')
        const bad = await writeDoc(dir, 'bad.md', INVALID_UTF8)
        const missing = path.join(dir, 'missing.md')

        const batch = await readContents([good, missing, bad], dir)

        expect(batch.contents).toEqual({ 'good.md': 'ok' })
        expect(batch.failed.map((f) => f.path)).toEqual([missing, bad])
        expect(batch.failed[0].error).toBe(`Not found: ${missing}`)
    })
})
