/**
 * cloudprobe
 *
 * Main entry point that re-exports all modules.
 */

// Auth module - token negotiation and service endpoint resolution
export * as auth from './auth/index.js'

// Config module - layered, validated configuration
export * as config from './config/index.js'

// Error module - error hierarchy with namespaced codes
export * as errors from './errors/index.js'

// Images module - image service v2 client and behaviors
export * as images from './images/index.js'

// Object storage module - client, behaviors and feature resolution
export * as objectstorage from './objectstorage/index.js'

// Fixtures module - suite setup, feature gating and cleanup
export * as fixtures from './fixtures/index.js'

// Emulator module - in-process identity, object-storage and image services
export * as emulator from './emulator/index.js'

export { createLogger, Logger, type LogLevel, type LoggerConfig, type LogOutput } from './utils/logger.js'
export { randName, randomString } from './utils/datagen.js'
