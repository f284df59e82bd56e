/**
 * Object Storage API client (Swift v1 account/container/object API).
 *
 * `storageUrl` is the account URL, e.g. https://storage.example.com/v1/AUTH_tenant.
 */

import { z } from 'zod'
import { ObjectStorageError } from '../errors/index.js'
import { HttpClient, type ApiResponse } from '../http/client.js'
import { createLogger, type Logger } from '../utils/logger.js'

// ============================================================================
// Entities
// ============================================================================

export const swiftInfoSchema = z.record(z.unknown())

export type SwiftInfo = z.infer<typeof swiftInfoSchema>

const objectEntrySchema = z
  .object({
    name: z.string(),
    bytes: z.number(),
    hash: z.string(),
    content_type: z.string(),
    last_modified: z.string(),
  })
  .passthrough()

export const objectListSchema = z.array(objectEntrySchema)

export type ObjectEntry = z.infer<typeof objectEntrySchema>

const containerEntrySchema = z
  .object({
    name: z.string(),
    count: z.number(),
    bytes: z.number(),
  })
  .passthrough()

export const containerListSchema = z.array(containerEntrySchema)

export type ContainerEntry = z.infer<typeof containerEntrySchema>

export type ListQuery = {
  prefix?: string
  marker?: string
  limit?: number
}

/** Page size used when draining a container */
const DRAIN_PAGE_SIZE = 1000

function encodeObjectName(name: string): string {
  return name.split('/').map(encodeURIComponent).join('/')
}

// ============================================================================
// Client
// ============================================================================

export class ObjectStorageClient extends HttpClient {
  constructor(
    readonly storageUrl: string,
    readonly authToken: string,
    options: { timeoutMs?: number; logger?: Logger } = {}
  ) {
    super({
      baseUrl: storageUrl,
      headers: { 'X-Auth-Token': authToken },
      timeoutMs: options.timeoutMs,
      logger: options.logger ?? createLogger({ service: 'objectstorage' }),
    })
  }

  /**
   * Capabilities document served at the cluster root
   */
  getSwiftInfo(): Promise<ApiResponse<SwiftInfo>> {
    const infoUrl = new URL('/info', this.storageUrl).toString()
    return this.request('GET', infoUrl, { entity: swiftInfoSchema })
  }

  listContainers(query: ListQuery = {}): Promise<ApiResponse<ContainerEntry[]>> {
    return this.request('GET', '', {
      query: { format: 'json', ...query },
      entity: containerListSchema,
    })
  }

  createContainer(name: string, headers?: Record<string, string>): Promise<ApiResponse> {
    return this.request('PUT', `/${encodeURIComponent(name)}`, { headers })
  }

  getContainerMetadata(name: string): Promise<ApiResponse> {
    return this.request('HEAD', `/${encodeURIComponent(name)}`)
  }

  setContainerMetadata(name: string, headers: Record<string, string>): Promise<ApiResponse> {
    return this.request('POST', `/${encodeURIComponent(name)}`, { headers })
  }

  listObjects(container: string, query: ListQuery = {}): Promise<ApiResponse<ObjectEntry[]>> {
    return this.request('GET', `/${encodeURIComponent(container)}`, {
      query: { format: 'json', ...query },
      entity: objectListSchema,
    })
  }

  deleteContainer(name: string): Promise<ApiResponse> {
    return this.request('DELETE', `/${encodeURIComponent(name)}`)
  }

  createObject(
    container: string,
    name: string,
    data: string,
    headers?: Record<string, string>
  ): Promise<ApiResponse> {
    return this.request('PUT', `/${encodeURIComponent(container)}/${encodeObjectName(name)}`, {
      body: data,
      headers,
    })
  }

  getObject(container: string, name: string, headers?: Record<string, string>): Promise<ApiResponse> {
    return this.request('GET', `/${encodeURIComponent(container)}/${encodeObjectName(name)}`, { headers })
  }

  getObjectMetadata(container: string, name: string): Promise<ApiResponse> {
    return this.request('HEAD', `/${encodeURIComponent(container)}/${encodeObjectName(name)}`)
  }

  deleteObject(container: string, name: string): Promise<ApiResponse> {
    return this.request('DELETE', `/${encodeURIComponent(container)}/${encodeObjectName(name)}`)
  }

  /**
   * Delete every object in each container, then the container itself.
   * Containers or objects that are already gone are ignored.
   *
   * @throws ObjectStorageError on any other unexpected status
   */
  async forceDeleteContainers(names: readonly string[]): Promise<void> {
    for (const container of names) {
      await this.drainContainer(container)

      const response = await this.deleteContainer(container)
      if (!response.ok && response.statusCode !== 404) {
        throw new ObjectStorageError('unexpected-status', `Deleting container ${container} returned ${response.statusCode}`, {
          httpStatus: response.statusCode,
          container,
        })
      }
    }
  }

  /**
   * Listings can lag behind deletes, so each page starts after the last name
   * seen rather than from the top.
   */
  private async drainContainer(container: string): Promise<void> {
    let marker: string | undefined
    for (;;) {
      const listing = await this.listObjects(container, {
        limit: DRAIN_PAGE_SIZE,
        ...(marker === undefined ? {} : { marker }),
      })
      if (listing.statusCode === 404) {
        return
      }
      if (!listing.ok) {
        throw new ObjectStorageError('unexpected-status', `Listing container ${container} returned ${listing.statusCode}`, {
          httpStatus: listing.statusCode,
          container,
        })
      }

      const objects = listing.entity ?? []
      if (objects.length === 0) {
        return
      }

      for (const object of objects) {
        const response = await this.deleteObject(container, object.name)
        if (!response.ok && response.statusCode !== 404) {
          throw new ObjectStorageError('unexpected-status', `Deleting ${container}/${object.name} returned ${response.statusCode}`, {
            httpStatus: response.statusCode,
            container,
          })
        }
        marker = object.name
      }
    }
  }
}
