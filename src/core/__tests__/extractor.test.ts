import { describe, it, expect } from 'vitest'
import { RegexMetadataExtractor, extractSummary, extractTags } from '../extractor.js'
import { extractDate, truncateUtf16Safe } from '../utils.js'

describe('extractDate', () => {
    it('takes the embedded YYYY-MM-DD from the filename', () => {
        expect(extractDate('2026-02-01-notes.md')).toBe('2026-02-01')
    })

    it('returns unknown when the filename has no date', () => {
        expect(extractDate('notes.md')).toBe('unknown')
    })

    it('uses the basename only, never the directory', () => {
        expect(extractDate('/archive/2025-12-31/notes.md')).toBe('unknown')
    })

    it('accepts digit patterns that are not real calendar dates', () => {
        expect(extractDate('log-9999-99-99.md')).toBe('9999-99-99')
    })

    it('takes the first match', () => {
        expect(extractDate('2026-01-05_to_2026-01-09.md')).toBe('2026-01-05')
    })
})

describe('extractTags', () => {
    it('finds hashtags anywhere in the content', () => {
        expect(extractTags('Decided to use #memory and #tools today')).toEqual(['#memory', '#tools'])
    })

    it('keeps first-occurrence order and drops duplicates', () => {
        expect(extractTags('#b then #a then #b again\n#c #a')).toEqual(['#b', '#a', '#c'])
    })

    it('does not treat heading markers as tags', () => {
        expect(extractTags('# Title\n## Section\nplain text')).toEqual([])
    })

    it('stops a tag at punctuation', () => {
        expect(extractTags('shipped (#release-notes).')).toEqual(['#release'])
    })

    it('accepts non-ASCII word characters', () => {
        expect(extractTags('tagged #café and #日本')).toEqual(['#café', '#日本'])
    })

    it('is case-sensitive', () => {
        expect(extractTags('#Memory #memory')).toEqual(['#Memory', '#memory'])
    })
})

describe('extractSummary', () => {
    it('returns the first non-heading, non-blank line trimmed', () => {
        const content = '# 2026-02-01\n\n## Morning\n\n   Reviewed the index layout.  \nSecond line'
        expect(extractSummary(content)).toBe('Reviewed the index layout.')
    })

    it('truncates a long first line to exactly 200 characters', () => {
        const line = 'x'.repeat(120) + 'y'.repeat(130)
        const summary = extractSummary(`# Heading\n${line}\n`)
        expect(summary).toHaveLength(200)
        expect(line.startsWith(summary)).toBe(true)
    })

    it('falls back to the raw content when every line is a heading', () => {
        expect(extractSummary('# Only\n## Headings\n')).toBe('# Only\n## Headings\n')
    })

    it('falls back to the first 200 raw characters, untrimmed', () => {
        const content = `  # ${'h'.repeat(300)}`
        expect(extractSummary(content)).toBe(content.slice(0, 200))
    })

    it('treats an indented heading as a heading', () => {
        expect(extractSummary('   # Indented\nbody')).toBe('body')
    })

    it('handles CRLF line endings', () => {
        expect(extractSummary('# Title\r\n\r\nbody line\r\n')).toBe('body line')
    })
})

describe('truncateUtf16Safe', () => {
    it('does not split a surrogate pair', () => {
        const input = 'ab\u{1F600}cd'
        expect(truncateUtf16Safe(input, 3)).toBe('ab')
        expect(truncateUtf16Safe(input, 4)).toBe('ab\u{1F600}')
    })
})

describe('RegexMetadataExtractor', () => {
    it('combines date, tags and summary', () => {
        const extractor = new RegexMetadataExtractor()
        const metadata = extractor.extract(
            '# 2026-02-01\n\nDecided to use #memory and #tools today\n\n#memory #decisions\n',
            '2026-02-01.md'
        )
        expect(metadata).toEqual({
            date_created: '2026-02-01',
            tags: '#memory #tools #decisions',
            summary: 'Decided to use #memory and #tools today'
        })
    })
})
