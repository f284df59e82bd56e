/**
 * Object Storage HTTP Emulator
 *
 * Implements the parts of the Swift v1 API the suites use:
 * - GET /info (capabilities, unauthenticated)
 * - GET /auth/v1.0 (tempauth)
 * - account listing, container and object CRUD under /v1/{account}
 *
 * State lives in memory and can be cleared with reset().
 */

import { createHash } from 'crypto'
import type { IncomingMessage, ServerResponse } from 'http'
import { createLogger } from '../utils/logger.js'
import {
  header,
  readBody,
  sendEmpty,
  sendError,
  sendJson,
  sendText,
  startHttpServer,
  type RunningServer,
} from './http.js'
import type { IssuedToken, TokenStore } from './tokens.js'

const log = createLogger({ service: 'objectstorage-emulator' })

/** Capabilities reported at /info unless overridden */
export const DEFAULT_CAPABILITIES: Record<string, unknown> = {
  swift: { version: '2.31.1', max_file_size: 5368709122, account_listing_limit: 10000 },
  tempurl: { methods: ['GET', 'HEAD', 'PUT', 'POST', 'DELETE'] },
  bulk_delete: { max_deletes_per_request: 10000 },
  slo: { max_manifest_segments: 1000 },
  container_quotas: {},
}

const MAX_NAME_LENGTH = 256
const DEFAULT_LISTING_LIMIT = 10000

export interface TempAuthUser {
  /** X-Storage-User value, conventionally "account:user" */
  username: string
  password: string
  tenantId: string
}

export interface ObjectStorageEmulatorOptions {
  tokens: TokenStore
  capabilities?: Record<string, unknown>
  tempAuthUsers?: TempAuthUser[]
  /** Make /info answer with this status instead of the capabilities */
  infoStatus?: number
  port?: number
}

export interface ObjectStorageEmulator extends RunningServer {
  /** Account URL for a tenant, as a catalog would publish it */
  accountUrl(tenantId: string): string
  /** Drop every account, container and object */
  reset(): void
  /** Names of the containers currently in an account */
  containerNames(tenantId: string): string[]
}

interface StoredObject {
  data: Buffer
  contentType: string
  etag: string
  lastModified: Date
  metadata: Record<string, string>
}

interface StoredContainer {
  metadata: Record<string, string>
  objects: Map<string, StoredObject>
}

type Account = Map<string, StoredContainer>

/**
 * Collect `<prefix><name>` headers as lowercase name -> value
 */
function collectMetadata(req: IncomingMessage, prefix: string): Record<string, string> {
  const metadata: Record<string, string> = {}
  for (const [name, value] of Object.entries(req.headers)) {
    if (name.startsWith(prefix) && typeof value === 'string') {
      metadata[name.slice(prefix.length)] = value
    }
  }
  return metadata
}

function metadataHeaders(prefix: string, metadata: Record<string, string>): Record<string, string> {
  const headers: Record<string, string> = {}
  for (const [name, value] of Object.entries(metadata)) {
    headers[`${prefix}${name}`] = value
  }
  return headers
}

interface ListingOptions {
  prefix: string
  marker: string
  limit: number
}

function listingOptions(url: URL): ListingOptions {
  const limit = Number.parseInt(url.searchParams.get('limit') ?? '', 10)
  return {
    prefix: url.searchParams.get('prefix') ?? '',
    marker: url.searchParams.get('marker') ?? '',
    limit: Number.isNaN(limit) || limit <= 0 ? DEFAULT_LISTING_LIMIT : Math.min(limit, DEFAULT_LISTING_LIMIT),
  }
}

function selectNames(names: Iterable<string>, options: ListingOptions): string[] {
  return [...names]
    .filter((name) => name.startsWith(options.prefix) && name > options.marker)
    .sort()
    .slice(0, options.limit)
}

/**
 * Send a listing as JSON (format=json) or newline-separated names
 */
function sendListing<T extends { name: string }>(res: ServerResponse, url: URL, entries: T[]): void {
  if (url.searchParams.get('format') === 'json') {
    sendJson(res, 200, entries)
    return
  }
  if (entries.length === 0) {
    sendEmpty(res, 204)
    return
  }
  sendText(res, 200, entries.map((entry) => `${entry.name}\n`).join(''))
}

function containerUsage(container: StoredContainer): { count: number; bytes: number } {
  let bytes = 0
  for (const object of container.objects.values()) {
    bytes += object.data.length
  }
  return { count: container.objects.size, bytes }
}

export async function startObjectStorageEmulator(options: ObjectStorageEmulatorOptions): Promise<ObjectStorageEmulator> {
  const accounts = new Map<string, Account>()
  const capabilities = options.capabilities ?? DEFAULT_CAPABILITIES

  function getAccount(name: string): Account {
    let account = accounts.get(name)
    if (!account) {
      account = new Map()
      accounts.set(name, account)
    }
    return account
  }

  function handleTempAuth(req: IncomingMessage, res: ServerResponse, origin: string): void {
    const username = header(req, 'x-storage-user') ?? header(req, 'x-auth-user')
    const password = header(req, 'x-storage-pass') ?? header(req, 'x-auth-key')
    const user = options.tempAuthUsers?.find(
      (candidate) => candidate.username === username && candidate.password === password
    )
    if (!user) {
      sendText(res, 401, 'Unauthorized')
      return
    }
    const token = options.tokens.issue(user.tenantId)
    sendEmpty(res, 200, {
      'X-Storage-Url': `${origin}/v1/AUTH_${user.tenantId}`,
      'X-Auth-Token': token.id,
      'X-Storage-Token': token.id,
    })
  }

  function authorize(req: IncomingMessage, res: ServerResponse, accountName: string): IssuedToken | undefined {
    const token = options.tokens.lookup(header(req, 'x-auth-token'))
    if (!token) {
      sendText(res, 401, 'Unauthorized')
      return undefined
    }
    if (accountName !== `AUTH_${token.tenantId}`) {
      sendText(res, 403, 'Forbidden')
      return undefined
    }
    return token
  }

  async function handleAccount(req: IncomingMessage, res: ServerResponse, url: URL, account: Account): Promise<void> {
    if (req.method === 'GET' || req.method === 'HEAD') {
      let bytes = 0
      let objects = 0
      for (const container of account.values()) {
        const usage = containerUsage(container)
        bytes += usage.bytes
        objects += usage.count
      }
      const headers = {
        'X-Account-Container-Count': account.size,
        'X-Account-Object-Count': objects,
        'X-Account-Bytes-Used': bytes,
      }
      if (req.method === 'HEAD') {
        sendEmpty(res, 204, headers)
        return
      }
      const names = selectNames(account.keys(), listingOptions(url))
      const entries = names.map((name) => {
        const container = account.get(name)
        return { name, ...(container ? containerUsage(container) : { count: 0, bytes: 0 }) }
      })
      for (const [key, value] of Object.entries(headers)) {
        res.setHeader(key, value)
      }
      sendListing(res, url, entries)
      return
    }
    sendText(res, 405, 'Method Not Allowed')
  }

  async function handleContainer(
    req: IncomingMessage,
    res: ServerResponse,
    url: URL,
    account: Account,
    name: string
  ): Promise<void> {
    const container = account.get(name)

    switch (req.method) {
      case 'PUT': {
        if (name.length > MAX_NAME_LENGTH) {
          sendText(res, 400, `Container name length of ${name.length} longer than ${MAX_NAME_LENGTH}`)
          return
        }
        const metadata = collectMetadata(req, 'x-container-meta-')
        if (container) {
          Object.assign(container.metadata, metadata)
          sendEmpty(res, 202)
          return
        }
        account.set(name, { metadata, objects: new Map() })
        sendEmpty(res, 201)
        return
      }
      case 'POST': {
        if (!container) {
          sendText(res, 404, 'Not Found')
          return
        }
        Object.assign(container.metadata, collectMetadata(req, 'x-container-meta-'))
        for (const removed of Object.keys(collectMetadata(req, 'x-remove-container-meta-'))) {
          delete container.metadata[removed]
        }
        sendEmpty(res, 204)
        return
      }
      case 'HEAD':
      case 'GET': {
        if (!container) {
          sendText(res, 404, 'Not Found')
          return
        }
        const usage = containerUsage(container)
        const headers = {
          'X-Container-Object-Count': usage.count,
          'X-Container-Bytes-Used': usage.bytes,
          ...metadataHeaders('X-Container-Meta-', container.metadata),
        }
        if (req.method === 'HEAD') {
          sendEmpty(res, 204, headers)
          return
        }
        const names = selectNames(container.objects.keys(), listingOptions(url))
        const entries = names.flatMap((objectName) => {
          const object = container.objects.get(objectName)
          return object
            ? [
                {
                  name: objectName,
                  bytes: object.data.length,
                  hash: object.etag,
                  content_type: object.contentType,
                  last_modified: object.lastModified.toISOString().replace(/Z$/, ''),
                },
              ]
            : []
        })
        for (const [key, value] of Object.entries(headers)) {
          res.setHeader(key, value)
        }
        sendListing(res, url, entries)
        return
      }
      case 'DELETE': {
        if (!container) {
          sendText(res, 404, 'Not Found')
          return
        }
        if (container.objects.size > 0) {
          sendText(res, 409, 'There was a conflict when trying to complete your request.')
          return
        }
        account.delete(name)
        sendEmpty(res, 204)
        return
      }
      default:
        sendText(res, 405, 'Method Not Allowed')
    }
  }

  async function handleObject(
    req: IncomingMessage,
    res: ServerResponse,
    container: StoredContainer | undefined,
    name: string
  ): Promise<void> {
    if (!container) {
      sendText(res, 404, 'Not Found')
      return
    }
    const object = container.objects.get(name)

    switch (req.method) {
      case 'PUT': {
        if (name.length > 1024) {
          sendText(res, 400, 'Object name length exceeds 1024')
          return
        }
        const data = await readBody(req)
        const etag = createHash('md5').update(data).digest('hex')
        const stored: StoredObject = {
          data,
          contentType: (header(req, 'content-type') ?? 'application/octet-stream').split(';')[0].trim(),
          etag,
          lastModified: new Date(),
          metadata: collectMetadata(req, 'x-object-meta-'),
        }
        container.objects.set(name, stored)
        sendEmpty(res, 201, { Etag: etag, 'Last-Modified': stored.lastModified.toUTCString() })
        return
      }
      case 'GET':
      case 'HEAD': {
        if (!object) {
          sendText(res, 404, 'Not Found')
          return
        }
        const headers = {
          'Content-Type': object.contentType,
          'Content-Length': object.data.length,
          Etag: object.etag,
          'Last-Modified': object.lastModified.toUTCString(),
          ...metadataHeaders('X-Object-Meta-', object.metadata),
        }
        res.writeHead(200, headers)
        res.end(req.method === 'GET' ? object.data : undefined)
        return
      }
      case 'DELETE': {
        if (!object) {
          sendText(res, 404, 'Not Found')
          return
        }
        container.objects.delete(name)
        sendEmpty(res, 204)
        return
      }
      default:
        sendText(res, 405, 'Method Not Allowed')
    }
  }

  const running = await startHttpServer(
    async (req, res, url) => {
      const origin = `http://${req.headers.host ?? '127.0.0.1'}`
      const pathname = url.pathname.replace(/\/+$/, '') || '/'

      if (pathname === '/info' && req.method === 'GET') {
        if (options.infoStatus !== undefined) {
          sendError(res, options.infoStatus, 'Capabilities unavailable')
          return
        }
        sendJson(res, 200, capabilities)
        return
      }

      if (pathname === '/auth/v1.0' && req.method === 'GET') {
        handleTempAuth(req, res, origin)
        return
      }

      const segments = url.pathname.split('/').slice(1)
      if (segments[0] !== 'v1' || !segments[1]) {
        sendText(res, 404, 'Not Found')
        return
      }

      const accountName = decodeURIComponent(segments[1])
      if (!authorize(req, res, accountName)) {
        return
      }
      const account = getAccount(accountName)

      const containerName = segments[2] ? decodeURIComponent(segments[2]) : ''
      const objectName = segments.slice(3).map(decodeURIComponent).join('/')

      if (!containerName) {
        await handleAccount(req, res, url, account)
      } else if (!objectName) {
        await handleContainer(req, res, url, account, containerName)
      } else {
        await handleObject(req, res, account.get(containerName), objectName)
      }
    },
    log,
    options.port
  )

  return {
    ...running,
    accountUrl: (tenantId) => `${running.url}/v1/AUTH_${tenantId}`,
    reset: () => accounts.clear(),
    containerNames: (tenantId) => [...(accounts.get(`AUTH_${tenantId}`)?.keys() ?? [])].sort(),
  }
}
