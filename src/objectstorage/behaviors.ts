/**
 * Higher-level object-storage operations built on the raw client.
 */

import type { ObjectStorageApiConfig } from '../config/index.js'
import { ObjectStorageError } from '../errors/index.js'
import { randomString } from '../utils/datagen.js'
import type { ObjectStorageClient, SwiftInfo } from './client.js'

function uniqueName(base: string, descriptor: string): string {
  const middle = descriptor ? `${descriptor}_` : ''
  return `${base}_${middle}${randomString(12)}`
}

export class ObjectStorageBehaviors {
  constructor(
    readonly client: ObjectStorageClient,
    readonly config: ObjectStorageApiConfig
  ) {}

  /**
   * @throws ObjectStorageError when the capabilities document is unavailable
   */
  async getSwiftInfo(): Promise<SwiftInfo> {
    const response = await this.client.getSwiftInfo()
    if (response.statusCode !== 200 || !response.entity) {
      throw new ObjectStorageError('unexpected-status', `GET /info returned ${response.statusCode}`, {
        httpStatus: response.statusCode,
      })
    }
    return response.entity
  }

  /**
   * Features the cluster reports, as a whitespace-separated string: one
   * token per top-level key of the capabilities document.
   */
  async getSwiftFeatures(): Promise<string> {
    const info = await this.getSwiftInfo()
    return Object.keys(info).join(' ')
  }

  generateUniqueContainerName(descriptor: string = ''): string {
    return uniqueName(this.config.baseContainerName, descriptor)
  }

  generateUniqueObjectName(descriptor: string = ''): string {
    return uniqueName(this.config.baseObjectName, descriptor)
  }
}
