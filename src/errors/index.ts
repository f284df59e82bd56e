/**
 * cloudprobe Error Hierarchy
 *
 * Every error raised by the toolkit extends ProbeError and carries a
 * namespaced code of the form 'module/error-code'
 * (e.g. 'auth/authentication-failed', 'config/invalid-config').
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Auth-specific error codes
 */
export type AuthErrorCode =
  | 'authentication-failed'
  | 'unsupported-strategy'
  | 'service-not-found'
  | 'endpoint-not-found'
  | 'invalid-response'

/**
 * Config-specific error codes
 */
export type ConfigErrorCode = 'invalid-config' | 'unreadable-file' | 'missing-required-field'

/**
 * HTTP transport error codes
 */
export type HttpErrorCode = 'unavailable' | 'deadline-exceeded' | 'invalid-response'

/**
 * Object storage error codes
 */
export type ObjectStorageErrorCode = 'feature-discovery-failed' | 'unexpected-status'

/**
 * Image service error codes
 */
export type ImagesErrorCode = 'unexpected-status' | 'invalid-response'

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Error details that can be attached to any ProbeError
 */
export interface ProbeErrorDetails {
  /** HTTP status code (if applicable) */
  httpStatus?: number
  /** The original error that caused this error */
  cause?: Error
  /** Additional context-specific details */
  [key: string]: unknown
}

/**
 * Base class for all cloudprobe errors.
 *
 * @example
 * ```ts
 * throw new ProbeError('auth/authentication-failed', 'Authentication failed in setup')
 * throw new ProbeError('http/unavailable', 'Connection refused', { url })
 * ```
 */
export class ProbeError extends Error {
  override name = 'ProbeError'

  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: ProbeErrorDetails
  ) {
    super(message)

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }

    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Convert the error to a JSON-serializable object
   */
  toJSON(): { code: string; message: string; details?: ProbeErrorDetails } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    }
  }

  override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`
  }
}

// ============================================================================
// Module-Specific Error Classes
// ============================================================================

/**
 * Authentication and service catalog errors
 */
export class AuthError extends ProbeError {
  override name = 'AuthError'

  constructor(code: AuthErrorCode, message: string, details?: ProbeErrorDetails) {
    super(`auth/${code}`, message, details)
  }
}

/**
 * Configuration loading and validation errors
 */
export class ConfigError extends ProbeError {
  override name = 'ConfigError'

  constructor(code: ConfigErrorCode, message: string, details?: ProbeErrorDetails) {
    super(`config/${code}`, message, details)
  }
}

/**
 * Transport-level failures: the request never produced an HTTP response,
 * or the response body could not be decoded.
 */
export class HttpError extends ProbeError {
  override name = 'HttpError'

  constructor(code: HttpErrorCode, message: string, details?: ProbeErrorDetails) {
    super(`http/${code}`, message, details)
  }
}

/**
 * Object storage errors
 */
export class ObjectStorageError extends ProbeError {
  override name = 'ObjectStorageError'

  constructor(code: ObjectStorageErrorCode, message: string, details?: ProbeErrorDetails) {
    super(`objectstorage/${code}`, message, details)
  }
}

/**
 * Raised when the storage service's capability document cannot be fetched.
 * Surfaces to the runner as an error, never as a skip.
 */
export class FeatureDiscoveryError extends ObjectStorageError {
  override name = 'FeatureDiscoveryError'

  constructor(message: string, details?: ProbeErrorDetails) {
    super('feature-discovery-failed', message, details)
  }
}

/**
 * Image service errors
 */
export class ImagesError extends ProbeError {
  override name = 'ImagesError'

  constructor(code: ImagesErrorCode, message: string, details?: ProbeErrorDetails) {
    super(`images/${code}`, message, details)
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Type guard for ProbeError instances
 */
export function isProbeError(error: unknown): error is ProbeError {
  return error instanceof ProbeError
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value
  }
  return new Error(String(value))
}
