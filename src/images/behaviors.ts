import type { ImagesConfig } from '../config/index.js'
import { ImagesError } from '../errors/index.js'
import type { CleanupRegistry } from '../fixtures/cleanup.js'
import { randName } from '../utils/datagen.js'
import type { ImagesClient } from './client.js'
import type { CreateImageRequest, Image } from './models.js'

export class ImagesBehaviors {
  constructor(
    readonly client: ImagesClient,
    readonly config: ImagesConfig,
    private readonly resources: CleanupRegistry
  ) {}

  /**
   * Create an image with a generated name and the configured formats. The
   * image is deleted when the owning fixture tears down.
   *
   * @throws ImagesError unless the service answers 201 with an image
   */
  async createNewImage(overrides: CreateImageRequest = {}): Promise<Image> {
    const response = await this.client.createImage({
      name: randName('image'),
      containerFormat: this.config.containerFormat,
      diskFormat: this.config.diskFormat,
      ...overrides,
    })
    if (response.statusCode !== 201 || !response.entity) {
      throw new ImagesError('unexpected-status', `Image create returned ${response.statusCode}`, {
        httpStatus: response.statusCode,
        body: response.text,
      })
    }

    const image = response.entity
    this.resources.add(`delete image ${image.id}`, async () => {
      const deleted = await this.client.deleteImage(image.id)
      if (!deleted.ok && deleted.statusCode !== 404) {
        throw new ImagesError('unexpected-status', `Deleting image ${image.id} returned ${deleted.statusCode}`, {
          httpStatus: deleted.statusCode,
        })
      }
    })
    return image
  }
}
