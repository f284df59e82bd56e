/**
 * Images Fixture
 *
 * Authenticates once, builds the images client and behaviors, and deletes
 * every image the behaviors created when the suite tears down.
 */

import { ImagesAuthComposite } from '../auth/index.js'
import type { ProbeConfig } from '../config/index.js'
import { ProbeError } from '../errors/index.js'
import { ImagesBehaviors } from '../images/behaviors.js'
import { ImagesClient } from '../images/client.js'
import { createLogger, type Logger } from '../utils/logger.js'
import { CleanupRegistry, type CleanupFailure } from './cleanup.js'

export interface ImagesContext {
  client: ImagesClient
  behaviors: ImagesBehaviors
}

export class ImagesFixture {
  private readonly resources: CleanupRegistry
  private context: ImagesContext | null = null

  constructor(
    readonly config: Readonly<ProbeConfig>,
    options: { logger?: Logger } = {}
  ) {
    this.resources = new CleanupRegistry(options.logger ?? createLogger({ service: 'images-fixture' }))
  }

  async setup(): Promise<ImagesContext> {
    if (this.context) {
      return this.context
    }

    const auth = await ImagesAuthComposite.create(this.config)
    const client = new ImagesClient(auth.url, auth.authToken, {
      timeoutMs: this.config.http.requestTimeoutMs,
    })
    this.context = {
      client,
      behaviors: new ImagesBehaviors(client, this.config.images, this.resources),
    }
    return this.context
  }

  private requireContext(): ImagesContext {
    if (!this.context) {
      throw new ProbeError('fixture/not-set-up', 'ImagesFixture.setup() has not completed')
    }
    return this.context
  }

  get client(): ImagesClient {
    return this.requireContext().client
  }

  get behaviors(): ImagesBehaviors {
    return this.requireContext().behaviors
  }

  /**
   * Delete pooled images; call from afterAll
   */
  teardown(): Promise<CleanupFailure[]> {
    return this.resources.run()
  }
}
