// Memsift HTTP Server
// Serves the MemsiftCore API over HTTP (node:http)
// Default port: 3918 (override with MEMSIFT_PORT env var)
//
// Routes:
//   GET  /v1/health
//   POST /v1/index
//   GET  /v1/search?q=<query>&limit=<n>
//   GET  /v1/timeline?date=<YYYY[-MM[-DD]]>
//   GET  /v1/content?path=<path>

import http from 'node:http'
import { z } from 'zod'
import { MemsiftCore, resolveMemsiftPaths } from './core/index.js'
import type { ServerResponse } from 'node:http'
import type { MemsiftResult } from './core/index.js'

const DEFAULT_PORT = 3918

const searchParamsSchema = z.object({
    q: z.string().min(1, 'q is required'),
    limit: z.coerce.number().int().positive().default(10)
})

function send(res: ServerResponse, status: number, body: unknown): void {
    const json = JSON.stringify(body, null, 2)
    res.writeHead(status, { 'Content-Type': 'application/json; charset=utf-8' })
    res.end(json)
}

function sendError(res: ServerResponse, status: number, message: string): void {
    send(res, status, { ok: false, error: message })
}

function statusFor(result: MemsiftResult<unknown>): number {
    if (result.ok) return 200
    switch (result.code) {
        case 'QUERY_ERROR':
            return 400
        case 'NOT_FOUND':
            return 404
        case 'INDEX_LOCKED':
            return 409
        default:
            return 500
    }
}

export function createServer(core: MemsiftCore): http.Server {
    return http.createServer(async (req, res) => {
        const method = req.method ?? 'GET'
        const url = new URL(req.url ?? '/', 'http://localhost')

        try {
            // GET /v1/health
            if (method === 'GET' && url.pathname === '/v1/health') {
                const result = await core.health()
                send(res, result.ok ? 200 : 503, result)
                return
            }

            // POST /v1/index
            if (method === 'POST' && url.pathname === '/v1/index') {
                const result = await core.index()
                send(res, statusFor(result), result)
                return
            }

            // GET /v1/search
            if (method === 'GET' && url.pathname === '/v1/search') {
                const parsed = searchParamsSchema.safeParse({
                    q: url.searchParams.get('q') ?? undefined,
                    limit: url.searchParams.get('limit') ?? undefined
                })
                if (!parsed.success) {
                    sendError(res, 400, parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '))
                    return
                }
                const result = await core.search(parsed.data.q, parsed.data.limit)
                send(res, statusFor(result), result)
                return
            }

            // GET /v1/timeline
            if (method === 'GET' && url.pathname === '/v1/timeline') {
                const result = await core.timeline({ date: url.searchParams.get('date') ?? undefined })
                send(res, statusFor(result), result)
                return
            }

            // GET /v1/content
            if (method === 'GET' && url.pathname === '/v1/content') {
                const target = url.searchParams.get('path')
                if (!target) {
                    sendError(res, 400, 'Query must include "path"')
                    return
                }
                const result = await core.get([target])
                send(res, statusFor(result), result)
                return
            }

            sendError(res, 404, `Not found: ${method} ${url.pathname}`)
        } catch (error) {
            sendError(res, 500, error instanceof Error ? error.message : String(error))
        }
    })
}

export async function startServer(
    port?: number,
    core: MemsiftCore = new MemsiftCore(resolveMemsiftPaths())
): Promise<{ server: http.Server; port: number }> {
    const actualPort = port ?? Number(process.env.MEMSIFT_PORT ?? DEFAULT_PORT)

    const server = createServer(core)

    await new Promise<void>((resolve, reject) => {
        server.once('error', reject)
        server.listen(actualPort, () => {
            server.off('error', reject)
            resolve()
        })
    })

    const address = server.address()
    return { server, port: typeof address === 'object' && address !== null ? address.port : actualPort }
}
