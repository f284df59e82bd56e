/**
 * Auth Provider
 *
 * Negotiates a token with the identity service using the configured
 * strategy:
 *
 * - `keystone`: POST /v2.0/tokens with passwordCredentials
 * - `rax_auth`: POST /v2.0/tokens with RAX-KSKEY:apiKeyCredentials
 * - `saio_tempauth`: GET /auth/v1.0 with X-Storage-User / X-Storage-Pass
 */

import type { UserAuthConfig } from '../config/index.js'
import { HttpClient } from '../http/client.js'
import { createLogger, type Logger } from '../utils/logger.js'
import { AccessData, tokenResponseSchema } from './access-data.js'

const log = createLogger({ service: 'auth' })

export interface AuthProviderOptions {
  timeoutMs?: number
  logger?: Logger
}

function buildCredentials(config: UserAuthConfig): Record<string, unknown> {
  const tenant = config.tenantName ? { tenantName: config.tenantName } : {}
  if (config.strategy === 'rax_auth') {
    return {
      auth: {
        'RAX-KSKEY:apiKeyCredentials': { username: config.username, apiKey: config.apiKey },
        ...tenant,
      },
    }
  }
  return {
    auth: {
      passwordCredentials: { username: config.username, password: config.password },
      ...tenant,
    },
  }
}

export class AuthProvider {
  /**
   * Authenticate against the configured identity endpoint
   *
   * @returns the access data, or null when the service rejects the
   *   credentials
   * @throws HttpError when the endpoint cannot be reached
   */
  static async getAccessData(config: UserAuthConfig, options: AuthProviderOptions = {}): Promise<AccessData | null> {
    const logger = options.logger ?? log
    const client = new HttpClient({ baseUrl: config.endpoint, timeoutMs: options.timeoutMs, logger })

    if (config.strategy === 'saio_tempauth') {
      const response = await client.request('GET', '/auth/v1.0', {
        headers: {
          'X-Storage-User': config.username,
          'X-Storage-Pass': config.password ?? '',
        },
      })
      const storageUrl = response.headers.get('x-storage-url')
      const authToken = response.headers.get('x-auth-token')
      if (!response.ok || !storageUrl || !authToken) {
        logger.warn('tempauth request rejected', { status: response.statusCode, user: config.username })
        return null
      }
      return AccessData.fromTempAuth(storageUrl, authToken)
    }

    const response = await client.request('POST', '/v2.0/tokens', {
      json: buildCredentials(config),
      entity: tokenResponseSchema,
    })
    if (!response.ok || !response.entity) {
      logger.warn('token request rejected', { status: response.statusCode, user: config.username })
      return null
    }

    logger.debug('authenticated', { user: config.username, strategy: config.strategy })
    return AccessData.fromTokenResponse(response.entity)
  }
}
