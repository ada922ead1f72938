// Memsift CLI – thin shell
// All business logic lives in src/core/*.ts
// This file only handles: commander definitions, option validation, console output formatting

import { z } from 'zod'
import { Command } from 'commander'
import { MemsiftCore, resolveMemsiftPaths } from './core/index.js'
import type { SearchHit, TimelineEntry } from './core/index.js'

const VERSION = '0.1.0'

export const SNIPPET_PREVIEW_CHARS = 80
export const TIMELINE_TAIL = 10

export type CliOutput = {
  out: (line: string) => void
  err: (line: string) => void
}

export type CliDeps = {
  io?: CliOutput
  createCore?: (memoryDir: string | undefined, io: CliOutput) => MemsiftCore
}

// ─── Option schemas (Zod validation) ─────────────────────────────────────────

const limitSchema = z.coerce.number().int().positive()
const portSchema = z.coerce.number().int().min(0).max(65535)

function parseOption<T>(schema: z.ZodType<T>, raw: string, optionName: string): T {
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => i.message).join('; ')
    throw new Error(`Invalid ${optionName} '${raw}': ${details}`)
  }
  return parsed.data
}

// ─── Formatting ──────────────────────────────────────────────────────────────

export function formatSearchLine(hit: SearchHit): string {
  return `${hit.file} (${hit.date}): ${hit.snippet.slice(0, SNIPPET_PREVIEW_CHARS)}...`
}

export function formatTimelineLine(entry: TimelineEntry): string {
  return `${entry.date} - ${entry.file}`
}

const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
}

function defaultCore(memoryDir: string | undefined, io: CliOutput): MemsiftCore {
  return new MemsiftCore(resolveMemsiftPaths(memoryDir), { logger: { warn: io.err } })
}

// ─── Program ─────────────────────────────────────────────────────────────────

export function createProgram(deps: CliDeps = {}): Command {
  const io = deps.io ?? consoleOutput
  const createCore = deps.createCore ?? defaultCore

  const program = new Command()
    .name('memsift')
    .description('Progressive-disclosure full-text search over memory files')
    .version(VERSION)
    .option('--memory-dir <path>', 'Document root (default: ./memory, ~/.memsift/memory, then cwd)')

  const core = (): MemsiftCore => createCore(program.opts<{ memoryDir?: string }>().memoryDir, io)

  // ── index ─────────────────────────────────────────────────────────────────

  program
    .command('index')
    .description('Rebuild the search index from every memory file')
    .option('--json', 'Machine-readable JSON output')
    .action(async (opts: { json?: boolean }) => {
      const result = await core().index()
      if (!result.ok || !result.data) throw new Error(result.error)
      const { indexed, warnings, memoryDir } = result.data

      if (opts.json) {
        io.out(JSON.stringify({ indexed, warnings, memoryDir }))
      } else {
        io.out(`Indexed ${indexed} files in ${memoryDir}`)
        if (warnings.length > 0) io.err(`${warnings.length} file(s) skipped`)
      }
    })

  // ── search ────────────────────────────────────────────────────────────────

  program
    .command('search')
    .description('Layer 1: ranked snippets matching the query')
    .argument('<query>', 'Free-text query')
    .option('--limit <n>', 'Maximum results', '5')
    .option('--json', 'Machine-readable JSON output')
    .action(async (query: string, opts: { limit: string; json?: boolean }) => {
      const limit = parseOption(limitSchema, opts.limit, '--limit')
      const result = await core().search(query, limit)
      if (!result.ok || !result.data) throw new Error(result.error)
      const hits = result.data

      if (opts.json) {
        io.out(JSON.stringify(hits, null, 2))
        return
      }
      if (hits.length === 0) {
        io.err(`No matches for '${query}'`)
        return
      }
      for (const hit of hits) io.out(formatSearchLine(hit))
    })

  // ── timeline ──────────────────────────────────────────────────────────────

  program
    .command('timeline')
    .description(`Layer 2: dated listing (text output shows the last ${TIMELINE_TAIL})`)
    .option('--date <date>', 'Only entries whose date starts with YYYY, YYYY-MM or YYYY-MM-DD')
    .option('--json', 'Machine-readable JSON output (full list)')
    .action(async (opts: { date?: string; json?: boolean }) => {
      const result = await core().timeline({ date: opts.date })
      if (!result.ok || !result.data) throw new Error(result.error)

      if (opts.json) {
        io.out(JSON.stringify(result.data, null, 2))
      } else {
        for (const entry of result.data.slice(-TIMELINE_TAIL)) io.out(formatTimelineLine(entry))
      }
    })

  // ── get ───────────────────────────────────────────────────────────────────

  program
    .command('get')
    .description('Layer 3: full raw content of a memory file')
    .argument('<path>', 'File path (absolute, or relative to cwd or the memory dir)')
    .option('--json', 'Emit {"<filename>": "<content>"}')
    .action(async (target: string, opts: { json?: boolean }) => {
      const result = await core().get([target])
      if (!result.ok || !result.data) throw new Error(result.error)
      const contents = result.data.contents

      if (opts.json) {
        io.out(JSON.stringify(contents, null, 2))
      } else {
        for (const content of Object.values(contents)) io.out(content)
      }
    })

  // ── serve ─────────────────────────────────────────────────────────────────

  program
    .command('serve')
    .description('Start Memsift HTTP API server')
    .option('--port <port>', 'Port to listen on (default: 3918 or MEMSIFT_PORT)')
    .option('--json', 'Emit JSON status line on startup')
    .action(async (opts: { port?: string; json?: boolean }) => {
      const { startServer } = await import('./server.js')
      const port = opts.port ? parseOption(portSchema, opts.port, '--port') : undefined
      const { server, port: actualPort } = await startServer(port, core())

      if (opts.json) {
        io.out(JSON.stringify({ ok: true, step: 'serve', port: actualPort }))
      } else {
        io.out(`Memsift server listening on http://localhost:${actualPort}`)
        io.out('   GET  /v1/health')
        io.out('   POST /v1/index')
        io.out('   GET  /v1/search?q=...')
        io.out('   GET  /v1/timeline')
        io.out('   GET  /v1/content?path=...')
        io.out('   Ctrl+C to stop')
      }

      const shutdown = () => {
        server.close()
        process.exit(0)
      }
      process.on('SIGINT', shutdown)
      process.on('SIGTERM', shutdown)
    })

  return program
}

export async function run(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv)
}
