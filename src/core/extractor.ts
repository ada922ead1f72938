// Metadata extraction for Memsift
// Derives date, tags and summary from a document's filename and content

import { extractDate, truncateUtf16Safe } from './utils.js'
import type { DocumentMetadata } from './types.js'

export const SUMMARY_MAX_CHARS = 200

/** Swap in a stricter parser (front-matter aware, etc.) without touching the indexer. */
export interface MetadataExtractor {
    extract(content: string, filename: string): DocumentMetadata
}

const TAG_PATTERN = /#[\p{L}\p{N}_]+/gu

/** Hashtags in first-occurrence order, duplicates dropped. Case-sensitive. */
export function extractTags(content: string): string[] {
    const seen = new Set<string>()
    for (const match of content.matchAll(TAG_PATTERN)) {
        seen.add(match[0])
    }
    return [...seen]
}

export function extractSummary(content: string, maxChars = SUMMARY_MAX_CHARS): string {
    for (const line of content.split(/\r?\n/)) {
        const trimmed = line.trim()
        if (trimmed && !trimmed.startsWith('#')) {
            return truncateUtf16Safe(trimmed, maxChars)
        }
    }
    return truncateUtf16Safe(content, maxChars)
}

export class RegexMetadataExtractor implements MetadataExtractor {
    extract(content: string, filename: string): DocumentMetadata {
        return {
            date_created: extractDate(filename),
            tags: extractTags(content).join(' '),
            summary: extractSummary(content)
        }
    }
}

export const defaultExtractor: MetadataExtractor = new RegexMetadataExtractor()
