/**
 * Shared plumbing for the HTTP emulators.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http'
import { toError } from '../errors/index.js'
import type { Logger } from '../utils/logger.js'

const MAX_BODY_SIZE = 1048576 // 1MB

export type RequestHandler = (req: IncomingMessage, res: ServerResponse, url: URL) => Promise<void> | void

export interface RunningServer {
  /** Base URL, e.g. http://127.0.0.1:41234 */
  readonly url: string
  readonly port: number
  close(): Promise<void>
}

export class PayloadTooLargeError extends Error {
  override name = 'PayloadTooLargeError'
}

export function readBody(req: IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    let size = 0
    req.on('data', (chunk: Buffer) => {
      size += chunk.length
      if (size > MAX_BODY_SIZE) {
        req.destroy()
        reject(new PayloadTooLargeError('PAYLOAD_TOO_LARGE'))
        return
      }
      chunks.push(chunk)
    })
    req.on('end', () => resolve(Buffer.concat(chunks)))
    req.on('error', reject)
  })
}

/**
 * Parse a JSON request body; undefined when the body is not valid JSON
 */
export async function readJson(req: IncomingMessage): Promise<unknown> {
  const body = await readBody(req)
  if (body.length === 0) {
    return undefined
  }
  try {
    return JSON.parse(body.toString('utf-8'))
  } catch {
    return undefined
  }
}

export function sendJson(
  res: ServerResponse,
  statusCode: number,
  data: unknown,
  headers: Record<string, string | number> = {}
): void {
  res.writeHead(statusCode, { 'Content-Type': 'application/json; charset=utf-8', ...headers })
  res.end(JSON.stringify(data))
}

export function sendEmpty(res: ServerResponse, statusCode: number, headers: Record<string, string | number> = {}): void {
  res.writeHead(statusCode, headers)
  res.end()
}

export function sendText(
  res: ServerResponse,
  statusCode: number,
  text: string,
  headers: Record<string, string | number> = {}
): void {
  res.writeHead(statusCode, { 'Content-Type': 'text/plain; charset=utf-8', ...headers })
  res.end(text)
}

export function sendError(res: ServerResponse, statusCode: number, message: string): void {
  sendJson(res, statusCode, { error: { code: statusCode, message } })
}

/**
 * First value of a request header
 */
export function header(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name.toLowerCase()]
  return Array.isArray(value) ? value[0] : value
}

/**
 * Start a server on 127.0.0.1. Port 0 picks a free port.
 */
export function startHttpServer(handler: RequestHandler, log: Logger, port: number = 0): Promise<RunningServer> {
  const server: Server = createServer((req, res) => {
    const url = new URL(req.url || '/', `http://${req.headers.host ?? '127.0.0.1'}`)
    Promise.resolve(handler(req, res, url)).catch((error: unknown) => {
      const err = toError(error)
      if (err instanceof PayloadTooLargeError) {
        if (!res.headersSent) sendError(res, 413, 'Request entity too large')
        return
      }
      log.error('emulator request failed', { method: req.method, path: url.pathname }, err)
      if (!res.headersSent) {
        sendError(res, 500, err.message)
      } else {
        res.end()
      }
    })
  })

  return new Promise((resolve, reject) => {
    server.once('error', reject)
    server.listen(port, '127.0.0.1', () => {
      server.off('error', reject)
      const address = server.address()
      const boundPort = typeof address === 'object' && address !== null ? address.port : port
      log.debug('emulator listening', { port: boundPort })
      resolve({
        url: `http://127.0.0.1:${boundPort}`,
        port: boundPort,
        close: () =>
          new Promise<void>((resolveClose, rejectClose) => {
            server.closeAllConnections()
            server.close((error) => (error ? rejectClose(error) : resolveClose()))
          }),
      })
    })
  })
}
