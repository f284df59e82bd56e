/**
 * Access data returned by the identity service.
 *
 * Keystone v2 token responses are decoded into AccessData; tempauth only
 * yields a storage URL and token, which populate `storageUrl`/`authToken`
 * on an otherwise empty catalog.
 */

import { z } from 'zod'

// ============================================================================
// Wire Schemas
// ============================================================================

const endpointSchema = z
  .object({
    region: z.string().optional(),
    tenantId: z.string().optional(),
    publicURL: z.string(),
    internalURL: z.string().optional(),
  })
  .passthrough()

const serviceSchema = z
  .object({
    name: z.string(),
    type: z.string(),
    endpoints: z.array(endpointSchema),
  })
  .passthrough()

export const tokenResponseSchema = z.object({
  access: z.object({
    token: z.object({
      id: z.string().min(1),
      expires: z.string().optional(),
      tenant: z.object({ id: z.string(), name: z.string().optional() }).optional(),
    }),
    serviceCatalog: z.array(serviceSchema).default([]),
    user: z
      .object({
        id: z.string(),
        name: z.string(),
      })
      .optional(),
  }),
})

export type TokenResponse = z.infer<typeof tokenResponseSchema>
export type EndpointEntry = z.infer<typeof endpointSchema>

// ============================================================================
// Models
// ============================================================================

export interface Token {
  /** Token value sent as X-Auth-Token */
  id_: string
  expires?: string
  tenantId?: string
  tenantName?: string
}

export class CatalogService {
  constructor(
    readonly name: string,
    readonly type: string,
    readonly endpoints: readonly EndpointEntry[]
  ) {}

  /**
   * Endpoint for the region; a regionless endpoint matches any region.
   */
  getEndpoint(region: string): EndpointEntry | undefined {
    return (
      this.endpoints.find((endpoint) => endpoint.region === region) ??
      this.endpoints.find((endpoint) => endpoint.region === undefined)
    )
  }
}

export class AccessData {
  constructor(
    readonly token: Token,
    readonly serviceCatalog: readonly CatalogService[] = [],
    readonly storageUrl?: string,
    readonly authToken?: string
  ) {}

  static fromTokenResponse(response: TokenResponse): AccessData {
    const { token, serviceCatalog } = response.access
    return new AccessData(
      {
        id_: token.id,
        expires: token.expires,
        tenantId: token.tenant?.id,
        tenantName: token.tenant?.name,
      },
      serviceCatalog.map((service) => new CatalogService(service.name, service.type, service.endpoints))
    )
  }

  static fromTempAuth(storageUrl: string, authToken: string): AccessData {
    return new AccessData({ id_: authToken }, [], storageUrl, authToken)
  }

  getService(name: string): CatalogService | undefined {
    return this.serviceCatalog.find((service) => service.name === name)
  }
}
