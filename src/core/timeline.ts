// Timeline builder for Memsift
// Layer 2: chronological listing straight from filenames, no index involved

import path from 'node:path'
import { FileReadError, QueryError } from './errors.js'
import { DEFAULT_EXTENSIONS, extractDate, listDocumentFiles } from './utils.js'
import type { MemsiftLogger, TimelineEntry, TimelineOptions } from './types.js'

const DATE_PREFIX = /^\d{4}(-\d{2}(-\d{2})?)?$/

export async function buildTimeline(
    memoryDir: string,
    options: TimelineOptions = {},
    context: { extensions?: readonly string[]; logger?: MemsiftLogger } = {}
): Promise<TimelineEntry[]> {
    const logger = context.logger ?? console
    const prefix = options.date?.trim()
    if (prefix !== undefined && prefix !== '' && !DATE_PREFIX.test(prefix)) {
        throw new QueryError(`Invalid date '${options.date}': expected YYYY, YYYY-MM or YYYY-MM-DD`)
    }

    const files = await listDocumentFiles(memoryDir, context.extensions ?? DEFAULT_EXTENSIONS, (entryPath, cause) => {
        logger.warn(`Warning: ${new FileReadError(entryPath, cause).message}`)
    })
    const entries = files.map((filePath) => ({
        file: path.basename(filePath),
        date: extractDate(filePath),
        path: filePath
    }))

    return prefix ? entries.filter((e) => e.date.startsWith(prefix)) : entries
}
