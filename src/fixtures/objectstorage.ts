/**
 * Object Storage Fixture
 *
 * Shared setup for object-storage suites. One fixture instance per suite
 * file; its auth data and resolved feature set are computed once and reused
 * for the instance's lifetime.
 *
 * @example
 * ```ts
 * const fixture = new ObjectStorageFixture(config)
 * beforeAll(() => fixture.setup())
 * afterEach(() => fixture.cleanup())
 *
 * it('bulk deletes', async (ctx) => {
 *   await fixture.requireFeatures(ctx, 'bulk_delete')
 *   const container = await fixture.createTempContainer('bulk')
 * })
 * ```
 */

import { ObjectStorageAuthComposite } from '../auth/index.js'
import type { ProbeConfig } from '../config/index.js'
import { FeatureDiscoveryError, ObjectStorageError, ProbeError, toError } from '../errors/index.js'
import { ObjectStorageBehaviors } from '../objectstorage/behaviors.js'
import { ObjectStorageClient } from '../objectstorage/client.js'
import {
  checkRequiredFeatures,
  resolveFeatures,
  splitFeatures,
  type FeatureSet,
  type GateDecision,
} from '../objectstorage/features.js'
import { createLogger, type Logger } from '../utils/logger.js'
import { memoizeAsync, type Memoized } from '../utils/memoize.js'
import { CleanupRegistry, type CleanupFailure } from './cleanup.js'

/**
 * The part of a test context the gate needs (Vitest's TestContext fits)
 */
export interface SkippableContext {
  skip(note?: string): void
}

export interface ObjectStorageContext {
  client: ObjectStorageClient
  behaviors: ObjectStorageBehaviors
  storageUrl: string
  authToken: string
  baseContainerName: string
  baseObjectName: string
}

export class ObjectStorageFixture {
  private readonly log: Logger
  private readonly cleanups: CleanupRegistry
  private readonly authData: Memoized<ObjectStorageAuthComposite>
  private readonly features: Memoized<FeatureSet>
  private context: ObjectStorageContext | null = null

  constructor(
    readonly config: Readonly<ProbeConfig>,
    options: { logger?: Logger } = {}
  ) {
    this.log = options.logger ?? createLogger({ service: 'objectstorage-fixture' })
    this.cleanups = new CleanupRegistry(this.log)
    this.authData = memoizeAsync(() => ObjectStorageAuthComposite.create(this.config))
    this.features = memoizeAsync(() => this.computeFeatures())
  }

  /**
   * Storage URL and auth token, resolved once
   *
   * @throws AuthError when authentication fails
   */
  getAuthData(): Promise<ObjectStorageAuthComposite> {
    return this.authData()
  }

  /**
   * Effective feature set, resolved once
   *
   * @throws FeatureDiscoveryError when server discovery is enabled and fails
   */
  getFeatures(): Promise<FeatureSet> {
    return this.features()
  }

  private async computeFeatures(): Promise<FeatureSet> {
    const apiConfig = this.config.objectStorageApi

    let reported: string[] = []
    if (apiConfig.useSwiftInfo) {
      reported = splitFeatures(await this.discoverFeatures())
    }

    const features = resolveFeatures({
      configured: apiConfig.features,
      excluded: apiConfig.excludedFeatures,
      reported,
    })
    this.log.debug('resolved features', {
      kind: features.kind,
      ...(features.kind === 'subset' ? { features: [...features.features] } : {}),
    })
    return features
  }

  private async discoverFeatures(): Promise<string> {
    try {
      const auth = await this.getAuthData()
      const client = new ObjectStorageClient(auth.storageUrl, auth.authToken, {
        timeoutMs: this.config.http.requestTimeoutMs,
        logger: this.log,
      })
      return await new ObjectStorageBehaviors(client, this.config.objectStorageApi).getSwiftFeatures()
    } catch (error) {
      const cause = toError(error)
      throw new FeatureDiscoveryError(`Feature discovery failed: ${cause.message}`, {
        cause,
        ...(error instanceof ProbeError ? { causeCode: error.code } : {}),
      })
    }
  }

  /**
   * Decide whether a test needing `required` may run
   */
  async requiredFeatures(...required: string[]): Promise<GateDecision> {
    return checkRequiredFeatures(await this.getFeatures(), required)
  }

  /**
   * Skip the calling test unless every required feature is available
   */
  async requireFeatures(context: SkippableContext, ...required: string[]): Promise<GateDecision> {
    const decision = await this.requiredFeatures(...required)
    if (decision.skip) {
      this.log.info(`skipping: ${decision.reason}`, { missing: [...decision.missing] })
      context.skip(decision.reason)
    }
    return decision
  }

  /**
   * Authenticate and build the client and behaviors. Safe to call more than
   * once; later calls return the same context.
   */
  async setup(): Promise<ObjectStorageContext> {
    if (this.context) {
      return this.context
    }

    const auth = await this.getAuthData()
    const apiConfig = this.config.objectStorageApi
    const client = new ObjectStorageClient(auth.storageUrl, auth.authToken, {
      timeoutMs: this.config.http.requestTimeoutMs,
    })

    this.context = {
      client,
      behaviors: new ObjectStorageBehaviors(client, apiConfig),
      storageUrl: auth.storageUrl,
      authToken: auth.authToken,
      baseContainerName: apiConfig.baseContainerName,
      baseObjectName: apiConfig.baseObjectName,
    }
    return this.context
  }

  private requireContext(): ObjectStorageContext {
    if (!this.context) {
      throw new ProbeError('fixture/not-set-up', 'ObjectStorageFixture.setup() has not completed')
    }
    return this.context
  }

  get client(): ObjectStorageClient {
    return this.requireContext().client
  }

  get behaviors(): ObjectStorageBehaviors {
    return this.requireContext().behaviors
  }

  /**
   * Create a uniquely named container that is force-deleted at cleanup
   *
   * @returns the container name
   * @throws ObjectStorageError when the service does not create it
   */
  async createTempContainer(descriptor: string = '', headers?: Record<string, string>): Promise<string> {
    const { client, behaviors } = this.requireContext()
    const name = behaviors.generateUniqueContainerName(descriptor)
    this.cleanups.add(`force delete container ${name}`, () => client.forceDeleteContainers([name]))

    const response = await client.createContainer(name, headers)
    if (!response.ok) {
      throw new ObjectStorageError('unexpected-status', `Creating container ${name} returned ${response.statusCode}`, {
        httpStatus: response.statusCode,
        container: name,
      })
    }
    return name
  }

  /**
   * Register an extra cleanup for the current test
   */
  addCleanup(description: string, fn: () => Promise<void> | void): void {
    this.cleanups.add(description, fn)
  }

  /**
   * Run registered cleanups; call from afterEach
   */
  cleanup(): Promise<CleanupFailure[]> {
    return this.cleanups.run()
  }
}
