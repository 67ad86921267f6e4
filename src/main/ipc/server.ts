import { createServer, type IncomingMessage, type Server } from 'http'
import { dispatch, IpcError } from './registry'
import { getSession } from '../security/session'
import type { ExportFile } from '../../shared/types/export'
import type { IpcResponse } from '../../shared/types/ipc'

const IPC_PREFIX = '/ipc/'
const MAX_BODY_BYTES = 1024 * 1024

export interface BridgeRequest {
  method: string
  path: string
  authorization: string | undefined
  body: string
}

export interface BridgeResponse {
  status: number
  headers: Record<string, string>
  body: Buffer | string
}

function isExportFile(value: unknown): value is ExportFile {
  return (
    typeof value === 'object' &&
    value !== null &&
    'filename' in value &&
    'mimeType' in value &&
    'data' in value &&
    typeof value.filename === 'string' &&
    typeof value.mimeType === 'string' &&
    Buffer.isBuffer(value.data)
  )
}

function json(status: number, body: IpcResponse): BridgeResponse {
  return {
    status,
    headers: { 'Content-Type': 'application/json; charset=utf-8' },
    body: JSON.stringify(body)
  }
}

function bearerToken(header: string | undefined): string | null {
  const match = header?.match(/^Bearer\s+(.+)$/i)
  return match ? match[1].trim() : null
}

function parsePayload(body: string): unknown {
  if (!body.trim()) return undefined
  let parsed: unknown
  try {
    parsed = JSON.parse(body)
  } catch {
    throw new IpcError('Request body must be JSON', 400)
  }
  if (typeof parsed !== 'object' || parsed === null || !('payload' in parsed)) return undefined
  return parsed.payload
}

/** Route one bridge request to its channel handler. */
export async function handleBridgeRequest(request: BridgeRequest): Promise<BridgeResponse> {
  if (request.method !== 'POST' || !request.path.startsWith(IPC_PREFIX)) {
    return json(404, { ok: false, error: 'Not found' })
  }

  const channel = decodeURIComponent(request.path.slice(IPC_PREFIX.length))
  try {
    const session = getSession(bearerToken(request.authorization))
    const result = await dispatch(channel, parsePayload(request.body), session)

    if (isExportFile(result)) {
      return {
        status: 200,
        headers: {
          'Content-Type': result.mimeType,
          'Content-Disposition': `attachment; filename*=UTF-8''${encodeURIComponent(result.filename)}`
        },
        body: result.data
      }
    }
    return json(200, { ok: true, result: result ?? null })
  } catch (err) {
    const status = err instanceof IpcError ? err.status : 500
    const message = err instanceof Error ? err.message : String(err)
    if (status >= 500) {
      console.error(`[IPC] ${channel} failed:`, err)
    } else {
      console.warn(`[IPC] ${channel} rejected (${status}): ${message}`)
    }
    return json(status, { ok: false, error: message })
  }
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    let size = 0
    req.on('data', (chunk: Buffer) => {
      size += chunk.length
      if (size > MAX_BODY_BYTES) {
        reject(new IpcError('Request body too large', 413))
        req.destroy()
        return
      }
      chunks.push(chunk)
    })
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')))
    req.on('error', reject)
  })
}

export function startIpcServer(port: number, host = '127.0.0.1'): Promise<Server> {
  const server = createServer(async (req, res) => {
    try {
      const response = await handleBridgeRequest({
        method: req.method || 'GET',
        path: new URL(req.url || '/', `http://${host}:${port}`).pathname,
        authorization: req.headers.authorization,
        body: await readBody(req)
      })
      res.writeHead(response.status, response.headers)
      res.end(response.body)
    } catch (err) {
      const status = err instanceof IpcError ? err.status : 500
      console.error('[IPC] Request failed:', err)
      res.writeHead(status, { 'Content-Type': 'application/json; charset=utf-8' })
      res.end(JSON.stringify({ ok: false, error: err instanceof Error ? err.message : String(err) }))
    }
  })

  return new Promise<Server>((resolve, reject) => {
    server.on('error', reject)
    server.listen(port, host, () => {
      console.log(`[IPC] Listening on http://${host}:${port}`)
      resolve(server)
    })
  })
}
