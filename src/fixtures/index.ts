/**
 * Fixtures Module
 *
 * Re-exports all public APIs from the fixtures module.
 */

export { CleanupRegistry, type CleanupFn, type CleanupFailure } from './cleanup.js'
export {
  ObjectStorageFixture,
  type ObjectStorageContext,
  type SkippableContext,
} from './objectstorage.js'
export { ImagesFixture, type ImagesContext } from './images.js'
