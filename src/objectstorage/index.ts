/**
 * Object Storage Module
 *
 * Re-exports all public APIs from the objectstorage module.
 */

export {
  ObjectStorageClient,
  swiftInfoSchema,
  objectListSchema,
  containerListSchema,
  type SwiftInfo,
  type ObjectEntry,
  type ContainerEntry,
  type ListQuery,
} from './client.js'

export { ObjectStorageBehaviors } from './behaviors.js'

export {
  ALL,
  NONE,
  subset,
  splitFeatures,
  formatFeatureSet,
  parseFeatureSet,
  resolveFeatures,
  missingFeatures,
  checkRequiredFeatures,
  type FeatureSet,
  type FeatureResolutionInput,
  type GateDecision,
} from './features.js'
