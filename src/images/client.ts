/**
 * Image service v2 client.
 *
 * `url` is the service root from the catalog (without the /v2 suffix).
 */

import { HttpClient, type ApiResponse } from '../http/client.js'
import { createLogger, type Logger } from '../utils/logger.js'
import {
  imageListSchema,
  imageSchema,
  toCreateImageBody,
  type CreateImageRequest,
  type Image,
  type ImageList,
} from './models.js'
import { buildImagePatch, IMAGE_PATCH_MEDIA_TYPE, type ImagePatch } from './patch.js'

export type ListImagesQuery = {
  limit?: number
  marker?: string
  name?: string
  status?: string
  visibility?: string
}

export class ImagesClient extends HttpClient {
  constructor(url: string, authToken: string, options: { timeoutMs?: number; logger?: Logger } = {}) {
    super({
      baseUrl: `${url.replace(/\/+$/, '').replace(/\/v2$/, '')}/v2`,
      headers: { 'X-Auth-Token': authToken },
      timeoutMs: options.timeoutMs,
      logger: options.logger ?? createLogger({ service: 'images' }),
    })
  }

  createImage(request: CreateImageRequest = {}): Promise<ApiResponse<Image>> {
    return this.request('POST', '/images', { json: toCreateImageBody(request), entity: imageSchema })
  }

  getImage(id: string): Promise<ApiResponse<Image>> {
    return this.request('GET', `/images/${encodeURIComponent(id)}`, { entity: imageSchema })
  }

  listImages(query: ListImagesQuery = {}): Promise<ApiResponse<ImageList>> {
    return this.request('GET', '/images', { query: { ...query }, entity: imageListSchema })
  }

  /**
   * Apply add/remove/replace mutations to the image's properties
   *
   * @example
   * ```ts
   * await client.updateImage(image.id, { add: { user_prop: 'value' } })
   * await client.updateImage(image.id, { remove: { user_prop: 'value' } })
   * ```
   */
  updateImage(id: string, patch: ImagePatch): Promise<ApiResponse<Image>> {
    return this.request('PATCH', `/images/${encodeURIComponent(id)}`, {
      json: buildImagePatch(patch),
      contentType: IMAGE_PATCH_MEDIA_TYPE,
      entity: imageSchema,
    })
  }

  deleteImage(id: string): Promise<ApiResponse> {
    return this.request('DELETE', `/images/${encodeURIComponent(id)}`)
  }

  addTag(id: string, tag: string): Promise<ApiResponse> {
    return this.request('PUT', `/images/${encodeURIComponent(id)}/tags/${encodeURIComponent(tag)}`)
  }

  deleteTag(id: string, tag: string): Promise<ApiResponse> {
    return this.request('DELETE', `/images/${encodeURIComponent(id)}/tags/${encodeURIComponent(tag)}`)
  }
}
