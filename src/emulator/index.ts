/**
 * Emulator Module
 *
 * Re-exports all public APIs from the emulator module.
 */

export {
  startCloudEmulator,
  DEFAULT_USER,
  DEFAULT_TEMPAUTH_USER,
  EMULATOR_REGION,
  OBJECT_STORAGE_SERVICE,
  IMAGES_SERVICE,
  type CloudEmulator,
  type CloudEmulatorOptions,
} from './cloud.js'
export { startIdentityEmulator, type EmulatedUser, type CatalogEntry, type IdentityEmulatorOptions } from './identity.js'
export {
  startObjectStorageEmulator,
  DEFAULT_CAPABILITIES,
  type ObjectStorageEmulator,
  type ObjectStorageEmulatorOptions,
  type TempAuthUser,
} from './object-storage.js'
export { startImagesEmulator, type ImagesEmulator, type ImagesEmulatorOptions } from './images.js'
export { TokenStore, type IssuedToken } from './tokens.js'
export { type RunningServer } from './http.js'
