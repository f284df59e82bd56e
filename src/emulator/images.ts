/**
 * Image Service v2 HTTP Emulator
 *
 * Implements image create/get/list/delete, JSON-patch updates and tags.
 * No image data is stored; images stay "queued".
 */

import { randomUUID } from 'crypto'
import type { IncomingMessage, ServerResponse } from 'http'
import { pointerProperty } from '../images/patch.js'
import { createLogger } from '../utils/logger.js'
import { header, readJson, sendEmpty, sendError, sendJson, startHttpServer, type RunningServer } from './http.js'
import type { IssuedToken, TokenStore } from './tokens.js'

const log = createLogger({ service: 'images-emulator' })

const CONTAINER_FORMATS = ['ami', 'ari', 'aki', 'bare', 'ovf', 'ova', 'docker']
const DISK_FORMATS = ['ami', 'ari', 'aki', 'vhd', 'vhdx', 'vmdk', 'raw', 'qcow2', 'vdi', 'iso', 'ploop']
const VISIBILITIES = ['public', 'private', 'shared', 'community']

/** Properties only the service sets */
const READ_ONLY = new Set([
  'id',
  'status',
  'created_at',
  'updated_at',
  'self',
  'file',
  'schema',
  'size',
  'virtual_size',
  'checksum',
  'owner',
  'direct_url',
  'locations',
])

/** Schema properties that can be replaced but never removed */
const BASE_PROPERTIES = new Set([
  'name',
  'visibility',
  'protected',
  'tags',
  'container_format',
  'disk_format',
  'min_disk',
  'min_ram',
])

const PATCH_MEDIA_TYPES = [
  'application/openstack-images-v2.1-json-patch',
  'application/openstack-images-v2.0-json-patch',
]

const DEFAULT_PAGE_SIZE = 25

export interface ImagesEmulatorOptions {
  tokens: TokenStore
  port?: number
}

export interface ImagesEmulator extends RunningServer {
  reset(): void
  /** Number of images currently stored */
  imageCount(): number
}

type ImageDocument = Record<string, unknown>

/**
 * Rejection raised while validating or applying a request; mapped to its
 * HTTP status
 */
class RequestRejected extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message)
  }
}

function timestamp(): string {
  return new Date().toISOString().replace(/\.\d{3}Z$/, 'Z')
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validate a single property value against the image schema
 */
function validateProperty(name: string, value: unknown): void {
  switch (name) {
    case 'name':
      if (value !== null && typeof value !== 'string') throw new RequestRejected(400, 'name must be a string')
      return
    case 'visibility':
      if (typeof value !== 'string' || !VISIBILITIES.includes(value)) {
        throw new RequestRejected(400, `Invalid visibility value: ${String(value)}`)
      }
      return
    case 'protected':
      if (typeof value !== 'boolean') throw new RequestRejected(400, 'protected must be a boolean')
      return
    case 'tags':
      if (!Array.isArray(value) || !value.every((tag) => typeof tag === 'string')) {
        throw new RequestRejected(400, 'tags must be a list of strings')
      }
      return
    case 'container_format':
      if (value !== null && (typeof value !== 'string' || !CONTAINER_FORMATS.includes(value))) {
        throw new RequestRejected(400, `Invalid container format: ${String(value)}`)
      }
      return
    case 'disk_format':
      if (value !== null && (typeof value !== 'string' || !DISK_FORMATS.includes(value))) {
        throw new RequestRejected(400, `Invalid disk format: ${String(value)}`)
      }
      return
    case 'min_disk':
    case 'min_ram':
      if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
        throw new RequestRejected(400, `${name} must be a non-negative integer`)
      }
      return
    default:
      if (typeof value !== 'string') {
        throw new RequestRejected(400, `Additional property ${name} must be a string`)
      }
  }
}

function applyPatch(image: ImageDocument, operations: unknown): ImageDocument {
  if (!Array.isArray(operations)) {
    throw new RequestRejected(400, 'Patch document must be a list of operations')
  }

  const updated: ImageDocument = { ...image }
  for (const operation of operations) {
    if (!isRecord(operation)) {
      throw new RequestRejected(400, 'Each operation must be an object')
    }
    const { op, path } = operation
    if (typeof op !== 'string' || typeof path !== 'string') {
      throw new RequestRejected(400, 'Each operation needs "op" and "path"')
    }
    const name = pointerProperty(path)
    if (name === undefined) {
      throw new RequestRejected(400, `Unsupported path: ${path}`)
    }
    if (READ_ONLY.has(name)) {
      throw new RequestRejected(403, `Attribute '${name}' is read-only.`)
    }

    switch (op) {
      case 'add':
      case 'replace': {
        if (!('value' in operation)) {
          throw new RequestRejected(400, `Operation ${op} requires a value`)
        }
        if (op === 'replace' && !(name in updated)) {
          throw new RequestRejected(409, `Property ${name} does not exist.`)
        }
        validateProperty(name, operation.value)
        updated[name] = operation.value
        break
      }
      case 'remove': {
        if (BASE_PROPERTIES.has(name)) {
          throw new RequestRejected(403, `Properties ${name} must not be removed.`)
        }
        if (!(name in updated)) {
          throw new RequestRejected(409, `Property ${name} does not exist.`)
        }
        delete updated[name]
        break
      }
      default:
        throw new RequestRejected(400, `Unsupported operation: ${op}`)
    }
  }

  updated.updated_at = timestamp()
  return updated
}

export async function startImagesEmulator(options: ImagesEmulatorOptions): Promise<ImagesEmulator> {
  const images = new Map<string, ImageDocument>()

  function authorize(req: IncomingMessage, res: ServerResponse): IssuedToken | undefined {
    const token = options.tokens.lookup(header(req, 'x-auth-token'))
    if (!token) {
      sendError(res, 401, 'This server could not verify that you are authorized to access the document you requested.')
    }
    return token
  }

  function createImage(body: unknown, owner: string): ImageDocument {
    if (!isRecord(body)) {
      throw new RequestRejected(400, 'Request body must be a JSON object')
    }
    for (const [name, value] of Object.entries(body)) {
      if (READ_ONLY.has(name) && name !== 'id') {
        throw new RequestRejected(403, `Attribute '${name}' is read-only.`)
      }
      if (name !== 'id') {
        validateProperty(name, value)
      }
    }

    const id = typeof body.id === 'string' ? body.id : randomUUID()
    if (images.has(id)) {
      throw new RequestRejected(409, `Image with identifier ${id} already exists!`)
    }

    const now = timestamp()
    const image: ImageDocument = {
      name: null,
      visibility: 'shared',
      protected: false,
      tags: [],
      container_format: null,
      disk_format: null,
      min_disk: 0,
      min_ram: 0,
      ...body,
      id,
      status: 'queued',
      size: null,
      virtual_size: null,
      checksum: null,
      owner,
      created_at: now,
      updated_at: now,
      self: `/v2/images/${id}`,
      file: `/v2/images/${id}/file`,
      schema: '/v2/schemas/image',
    }
    images.set(id, image)
    return image
  }

  function listImages(url: URL): { images: ImageDocument[]; first: string; schema: string; next?: string } {
    const filters = ['name', 'status', 'visibility']
      .map((key) => [key, url.searchParams.get(key)] as const)
      .filter((entry): entry is readonly [string, string] => entry[1] !== null)

    let matching = [...images.values()].filter((image) => filters.every(([key, value]) => image[key] === value))

    const marker = url.searchParams.get('marker')
    if (marker) {
      const index = matching.findIndex((image) => image.id === marker)
      matching = index === -1 ? [] : matching.slice(index + 1)
    }

    const limit = Number.parseInt(url.searchParams.get('limit') ?? '', 10)
    const pageSize = Number.isNaN(limit) || limit <= 0 ? DEFAULT_PAGE_SIZE : limit
    const page = matching.slice(0, pageSize)
    const last = page[page.length - 1]

    return {
      images: page,
      first: '/v2/images',
      schema: '/v2/schemas/images',
      ...(matching.length > pageSize && last ? { next: `/v2/images?marker=${String(last.id)}&limit=${pageSize}` } : {}),
    }
  }

  const running = await startHttpServer(
    async (req, res, url) => {
      const segments = url.pathname.replace(/\/+$/, '').split('/').slice(1)
      if (segments[0] !== 'v2' || segments[1] !== 'images') {
        sendError(res, 404, 'Not Found')
        return
      }

      const token = authorize(req, res)
      if (!token) {
        return
      }

      const id = segments[2] ? decodeURIComponent(segments[2]) : undefined

      try {
        if (!id) {
          if (req.method === 'POST') {
            const image = createImage(await readJson(req), token.tenantId)
            sendJson(res, 201, image, { Location: `${url.origin}/v2/images/${String(image.id)}` })
            return
          }
          if (req.method === 'GET') {
            sendJson(res, 200, listImages(url))
            return
          }
          sendError(res, 405, 'Method not allowed')
          return
        }

        const image = images.get(id)
        if (!image) {
          sendError(res, 404, `No image found with ID ${id}`)
          return
        }

        if (segments[3] === 'tags' && segments[4]) {
          const tag = decodeURIComponent(segments[4])
          const tags = Array.isArray(image.tags) ? image.tags.filter((t): t is string => typeof t === 'string') : []
          if (req.method === 'PUT') {
            if (!tags.includes(tag)) tags.push(tag)
            images.set(id, { ...image, tags, updated_at: timestamp() })
            sendEmpty(res, 204)
            return
          }
          if (req.method === 'DELETE') {
            if (!tags.includes(tag)) {
              sendError(res, 404, `Tag ${tag} not found`)
              return
            }
            images.set(id, { ...image, tags: tags.filter((t) => t !== tag), updated_at: timestamp() })
            sendEmpty(res, 204)
            return
          }
          sendError(res, 405, 'Method not allowed')
          return
        }

        if (segments.length > 3) {
          sendError(res, 404, 'Not Found')
          return
        }

        switch (req.method) {
          case 'GET':
            sendJson(res, 200, image)
            return
          case 'PATCH': {
            const contentType = (header(req, 'content-type') ?? '').split(';')[0].trim()
            if (!PATCH_MEDIA_TYPES.includes(contentType)) {
              sendError(res, 415, `Unsupported Content-Type: ${contentType}`)
              return
            }
            const updated = applyPatch(image, await readJson(req))
            images.set(id, updated)
            sendJson(res, 200, updated)
            return
          }
          case 'DELETE':
            if (image.protected === true) {
              sendError(res, 403, `Image ${id} is protected and cannot be deleted.`)
              return
            }
            images.delete(id)
            sendEmpty(res, 204)
            return
          default:
            sendError(res, 405, 'Method not allowed')
        }
      } catch (error) {
        if (error instanceof RequestRejected) {
          sendError(res, error.status, error.message)
          return
        }
        throw error
      }
    },
    log,
    options.port
  )

  return {
    ...running,
    reset: () => images.clear(),
    imageCount: () => images.size,
  }
}
