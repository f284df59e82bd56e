/**
 * Cloud Emulator Suite
 *
 * Starts identity, object-storage and image emulators that share one token
 * store, with a service catalog pointing at the running emulators.
 */

import type { AuthStrategy, ProbeConfigInput } from '../config/index.js'
import { startIdentityEmulator, type CatalogEntry, type EmulatedUser } from './identity.js'
import { startImagesEmulator, type ImagesEmulator } from './images.js'
import { startObjectStorageEmulator, type ObjectStorageEmulator, type TempAuthUser } from './object-storage.js'
import type { RunningServer } from './http.js'
import { TokenStore } from './tokens.js'

export const EMULATOR_REGION = 'RegionOne'
export const OBJECT_STORAGE_SERVICE = 'cloudFiles'
export const IMAGES_SERVICE = 'cloudImages'

/** Placeholder credentials accepted by the emulators */
export const DEFAULT_USER: EmulatedUser = {
  username: 'test-user',
  password: 'test-password',
  apiKey: 'test-api-key',
  tenantId: '100001',
  tenantName: 'test-tenant',
}

export const DEFAULT_TEMPAUTH_USER: TempAuthUser = {
  username: 'test:tester',
  password: 'testing',
  tenantId: 'test',
}

export interface CloudEmulatorOptions {
  users?: EmulatedUser[]
  tempAuthUsers?: TempAuthUser[]
  /** Capabilities served at /info */
  capabilities?: Record<string, unknown>
  /** Make /info fail with this status */
  infoStatus?: number
}

export interface CloudEmulator {
  readonly tokens: TokenStore
  readonly identity: RunningServer
  readonly objectStorage: ObjectStorageEmulator
  readonly images: ImagesEmulator
  /**
   * Configuration pointing at this emulator suite for the given strategy,
   * authenticating as the first configured user
   */
  configOverrides(strategy?: AuthStrategy): ProbeConfigInput
  /** Clear stored containers, objects and images */
  reset(): void
  stop(): Promise<void>
}

export async function startCloudEmulator(options: CloudEmulatorOptions = {}): Promise<CloudEmulator> {
  const tokens = new TokenStore()
  const users = options.users ?? [DEFAULT_USER]
  const tempAuthUsers = options.tempAuthUsers ?? [DEFAULT_TEMPAUTH_USER]

  const objectStorage = await startObjectStorageEmulator({
    tokens,
    tempAuthUsers,
    capabilities: options.capabilities,
    infoStatus: options.infoStatus,
  })
  const images = await startImagesEmulator({ tokens })

  const catalog = (user: EmulatedUser): CatalogEntry[] => [
    {
      name: OBJECT_STORAGE_SERVICE,
      type: 'object-store',
      endpoints: [{ region: EMULATOR_REGION, tenantId: user.tenantId, publicURL: objectStorage.accountUrl(user.tenantId) }],
    },
    {
      name: IMAGES_SERVICE,
      type: 'image',
      endpoints: [{ region: EMULATOR_REGION, tenantId: user.tenantId, publicURL: images.url }],
    },
  ]
  const identity = await startIdentityEmulator({ users, tokens, catalog })

  return {
    tokens,
    identity,
    objectStorage,
    images,
    configOverrides(strategy: AuthStrategy = 'keystone'): ProbeConfigInput {
      const [user] = users
      const [tempUser] = tempAuthUsers
      const userAuth =
        strategy === 'saio_tempauth'
          ? { strategy, endpoint: objectStorage.url, username: tempUser?.username, password: tempUser?.password }
          : {
              strategy,
              endpoint: identity.url,
              username: user?.username,
              password: user?.password,
              apiKey: user?.apiKey,
            }
      return {
        userAuth,
        objectStorage: { identityServiceName: OBJECT_STORAGE_SERVICE, region: EMULATOR_REGION },
        images: { identityServiceName: IMAGES_SERVICE, region: EMULATOR_REGION },
      }
    },
    reset() {
      objectStorage.reset()
      images.reset()
    },
    async stop() {
      tokens.revokeAll()
      await Promise.all([identity.close(), objectStorage.close(), images.close()])
    },
  }
}
