// Query engine for Memsift
// Layer 1: ranked, highlighted hits mapped to display-ready shape

import path from 'node:path'
import { queryIndex } from './db.js'
import type { HighlightOptions, SearchHit } from './types.js'

export const DEFAULT_SEARCH_LIMIT = 10

export function searchIndex(
    dbPath: string,
    query: string,
    limit: number = DEFAULT_SEARCH_LIMIT,
    highlight?: HighlightOptions
): SearchHit[] {
    return queryIndex(dbPath, query, limit, highlight).map((r) => ({
        file: path.basename(r.path),
        date: r.date_created,
        snippet: r.snippet,
        tags: r.tags,
        path: r.path
    }))
}
