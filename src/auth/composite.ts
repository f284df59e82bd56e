/**
 * Auth composites: memoized authentication plus per-service resolution of
 * the endpoint URL and token a client needs.
 */

import type { ProbeConfig } from '../config/index.js'
import { AuthError } from '../errors/index.js'
import { memoizePerOwner } from '../utils/memoize.js'
import type { AccessData } from './access-data.js'
import { AuthProvider } from './provider.js'

const accessDataCache = memoizePerOwner(async (config: Readonly<ProbeConfig>): Promise<AccessData> => {
  const accessData = await AuthProvider.getAccessData(config.userAuth, {
    timeoutMs: config.http.requestTimeoutMs,
  })
  if (accessData === null) {
    throw new AuthError('authentication-failed', 'Authentication failed in setup', {
      endpoint: config.userAuth.endpoint,
      strategy: config.userAuth.strategy,
    })
  }
  return accessData
})

export const AuthComposite = {
  /**
   * Authenticate once per configuration object. A failed attempt is not
   * cached.
   */
  authenticate(config: Readonly<ProbeConfig>): Promise<AccessData> {
    return accessDataCache.get(config)
  },

  reset(config: Readonly<ProbeConfig>): void {
    accessDataCache.reset(config)
  },
}

/**
 * Endpoint URL and token for one catalog service
 */
export interface ServiceAuth {
  url: string
  authToken: string
}

/**
 * Look up `serviceName` in the catalog and take its public URL for `region`
 */
export function resolveCatalogEndpoint(accessData: AccessData, serviceName: string, region: string): ServiceAuth {
  const service = accessData.getService(serviceName)
  if (!service) {
    throw new AuthError('service-not-found', `Service "${serviceName}" is not in the service catalog`, {
      serviceName,
      available: accessData.serviceCatalog.map((entry) => entry.name),
    })
  }
  const endpoint = service.getEndpoint(region)
  if (!endpoint) {
    throw new AuthError('endpoint-not-found', `Service "${serviceName}" has no endpoint in region "${region}"`, {
      serviceName,
      region,
    })
  }
  return { url: endpoint.publicURL, authToken: accessData.token.id_ }
}

/**
 * Storage URL and auth token for the object-storage service
 */
export class ObjectStorageAuthComposite {
  private constructor(
    readonly storageUrl: string,
    readonly authToken: string
  ) {}

  static async create(config: Readonly<ProbeConfig>): Promise<ObjectStorageAuthComposite> {
    const accessData = await AuthComposite.authenticate(config)

    if (config.userAuth.strategy === 'saio_tempauth') {
      if (!accessData.storageUrl || !accessData.authToken) {
        throw new AuthError('invalid-response', 'tempauth response carried no storage URL')
      }
      return new ObjectStorageAuthComposite(accessData.storageUrl, accessData.authToken)
    }

    const { url, authToken } = resolveCatalogEndpoint(
      accessData,
      config.objectStorage.identityServiceName,
      config.objectStorage.region
    )
    return new ObjectStorageAuthComposite(url, authToken)
  }
}

/**
 * Image service URL and auth token. `images.endpointOverride` bypasses the
 * catalog lookup.
 */
export class ImagesAuthComposite {
  private constructor(
    readonly url: string,
    readonly authToken: string
  ) {}

  static async create(config: Readonly<ProbeConfig>): Promise<ImagesAuthComposite> {
    const accessData = await AuthComposite.authenticate(config)
    if (config.images.endpointOverride) {
      return new ImagesAuthComposite(config.images.endpointOverride, accessData.token.id_)
    }
    const { url, authToken } = resolveCatalogEndpoint(
      accessData,
      config.images.identityServiceName,
      config.images.region
    )
    return new ImagesAuthComposite(url, authToken)
  }
}
