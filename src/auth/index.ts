/**
 * Auth Module
 *
 * Re-exports all public APIs from the auth module.
 */

export {
  AccessData,
  CatalogService,
  tokenResponseSchema,
  type Token,
  type TokenResponse,
  type EndpointEntry,
} from './access-data.js'

export { AuthProvider, type AuthProviderOptions } from './provider.js'

export {
  AuthComposite,
  ObjectStorageAuthComposite,
  ImagesAuthComposite,
  resolveCatalogEndpoint,
  type ServiceAuth,
} from './composite.js'
