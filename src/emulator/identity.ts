/**
 * Identity HTTP Emulator
 *
 * Implements the keystone v2 token route with password and API-key
 * credentials. The service catalog is supplied by the caller so it can point
 * at the other emulators.
 */

import { z } from 'zod'
import { createLogger } from '../utils/logger.js'
import { readJson, sendError, sendJson, startHttpServer, type RunningServer } from './http.js'
import type { TokenStore } from './tokens.js'

const log = createLogger({ service: 'identity-emulator' })

export interface EmulatedUser {
  username: string
  password?: string
  apiKey?: string
  tenantId: string
  tenantName: string
}

export interface CatalogEntry {
  name: string
  type: string
  endpoints: { region: string; tenantId: string; publicURL: string; internalURL?: string }[]
}

export interface IdentityEmulatorOptions {
  users: EmulatedUser[]
  tokens: TokenStore
  catalog: (user: EmulatedUser) => CatalogEntry[]
  port?: number
}

const tokenRequestSchema = z.object({
  auth: z.object({
    passwordCredentials: z.object({ username: z.string(), password: z.string() }).optional(),
    'RAX-KSKEY:apiKeyCredentials': z.object({ username: z.string(), apiKey: z.string() }).optional(),
    tenantName: z.string().optional(),
  }),
})

function findUser(users: EmulatedUser[], request: z.infer<typeof tokenRequestSchema>): EmulatedUser | undefined {
  const { auth } = request
  const password = auth.passwordCredentials
  const apiKey = auth['RAX-KSKEY:apiKeyCredentials']

  const user = users.find((candidate) => {
    if (password) {
      return candidate.username === password.username && candidate.password === password.password
    }
    if (apiKey) {
      return candidate.username === apiKey.username && candidate.apiKey === apiKey.apiKey
    }
    return false
  })
  if (user && auth.tenantName && auth.tenantName !== user.tenantName) {
    return undefined
  }
  return user
}

export function startIdentityEmulator(options: IdentityEmulatorOptions): Promise<RunningServer> {
  return startHttpServer(
    async (req, res, url) => {
      if (req.method === 'GET' && (url.pathname === '/' || url.pathname === '/v2.0')) {
        sendJson(res, 200, { version: { id: 'v2.0', status: 'stable' } })
        return
      }

      if (url.pathname !== '/v2.0/tokens') {
        sendError(res, 404, 'Not Found')
        return
      }
      if (req.method !== 'POST') {
        sendError(res, 405, 'Method not allowed')
        return
      }

      const parsed = tokenRequestSchema.safeParse(await readJson(req))
      if (!parsed.success) {
        sendJson(res, 400, { badRequest: { code: 400, message: 'Malformed request body' } })
        return
      }

      const user = findUser(options.users, parsed.data)
      if (!user) {
        log.debug('rejected credentials')
        sendJson(res, 401, { unauthorized: { code: 401, message: 'Username or password is invalid' } })
        return
      }

      const token = options.tokens.issue(user.tenantId)
      sendJson(res, 200, {
        access: {
          token: {
            id: token.id,
            expires: token.expires,
            tenant: { id: user.tenantId, name: user.tenantName },
          },
          serviceCatalog: options.catalog(user),
          user: { id: `user-${user.username}`, name: user.username },
        },
      })
    },
    log,
    options.port
  )
}
