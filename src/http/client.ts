/**
 * Base HTTP client shared by the service clients.
 *
 * Non-2xx responses are returned, not thrown: functional tests assert on
 * status codes. Only transport failures (connection refused, timeout) and
 * undecodable 2xx bodies raise HttpError.
 */

import type { ZodType, ZodTypeDef } from 'zod'
import { HttpError, toError } from '../errors/index.js'
import { createLogger, type Logger } from '../utils/logger.js'

/** Default per-request timeout in milliseconds */
export const DEFAULT_TIMEOUT_MS = 30_000

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'COPY'

/**
 * Schema decoding a response body into an entity
 */
export type EntitySchema<T> = ZodType<T, ZodTypeDef, unknown>

export interface ApiResponse<T = undefined> {
  readonly statusCode: number
  readonly ok: boolean
  readonly headers: Headers
  /** Decoded body for 2xx responses when a schema was given */
  readonly entity: T | undefined
  /** Raw response body */
  readonly text: string
}

export interface RequestOptions<T> {
  headers?: Record<string, string>
  query?: Record<string, string | number | undefined>
  /** JSON body (serialized) */
  json?: unknown
  /** Raw body */
  body?: string
  /** Content-Type for `json` bodies (default application/json) */
  contentType?: string
  entity?: EntitySchema<T>
}

export interface HttpClientOptions {
  baseUrl: string
  headers?: Record<string, string>
  timeoutMs?: number
  logger?: Logger
}

export class HttpClient {
  readonly baseUrl: string
  protected readonly defaultHeaders: Record<string, string>
  protected readonly timeoutMs: number
  protected readonly log: Logger

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.defaultHeaders = { ...options.headers }
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.log = options.logger ?? createLogger({ service: 'http' })
  }

  /**
   * Build an absolute URL. Absolute `path` values are used as-is.
   */
  url(path: string, query?: RequestOptions<unknown>['query']): string {
    let absolute = path
    if (!/^https?:\/\//.test(path)) {
      absolute = path === '' ? this.baseUrl : `${this.baseUrl}${path.startsWith('/') ? '' : '/'}${path}`
    }
    const url = new URL(absolute)
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value))
      }
    }
    return url.toString()
  }

  async request<T = undefined>(method: HttpMethod, path: string, options: RequestOptions<T> = {}): Promise<ApiResponse<T>> {
    const url = this.url(path, options.query)
    const headers: Record<string, string> = { ...this.defaultHeaders, ...options.headers }

    let body: string | undefined = options.body
    if (options.json !== undefined) {
      body = JSON.stringify(options.json)
      headers['Content-Type'] = options.contentType ?? 'application/json'
    }

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)

    // the timer covers the body as well as the headers
    let response: Response
    let text: string
    try {
      response = await fetch(url, { method, headers, body, signal: controller.signal })
      text = method === 'HEAD' ? '' : await response.text()
    } catch (error) {
      if (controller.signal.aborted) {
        throw new HttpError('deadline-exceeded', `${method} ${url} timed out after ${this.timeoutMs}ms`, { url })
      }
      throw new HttpError('unavailable', `${method} ${url} failed: ${toError(error).message}`, {
        url,
        cause: toError(error),
      })
    } finally {
      clearTimeout(timeoutId)
    }

    this.log.debug(`${method} ${url}`, { status: response.status })

    let entity: T | undefined
    if (response.ok && options.entity && text.length > 0) {
      entity = this.decode(options.entity, text, url, response.status)
    }

    return {
      statusCode: response.status,
      ok: response.ok,
      headers: response.headers,
      entity,
      text,
    }
  }

  private decode<T>(schema: EntitySchema<T>, text: string, url: string, status: number): T {
    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    } catch (error) {
      throw new HttpError('invalid-response', `Response from ${url} is not JSON`, {
        url,
        httpStatus: status,
        cause: toError(error),
      })
    }

    const result = schema.safeParse(parsed)
    if (!result.success) {
      throw new HttpError('invalid-response', `Unexpected response shape from ${url}`, {
        url,
        httpStatus: status,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}
