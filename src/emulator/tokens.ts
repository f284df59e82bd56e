import { randomUUID } from 'crypto'

export interface IssuedToken {
  id: string
  tenantId: string
  expires: string
}

/** Token lifetime in milliseconds */
const TOKEN_TTL_MS = 24 * 60 * 60 * 1000

/**
 * Tokens shared by the identity emulator (which issues them) and the
 * service emulators (which check them).
 */
export class TokenStore {
  private readonly tokens = new Map<string, IssuedToken>()

  issue(tenantId: string): IssuedToken {
    const token: IssuedToken = {
      id: randomUUID().replace(/-/g, ''),
      tenantId,
      expires: new Date(Date.now() + TOKEN_TTL_MS).toISOString(),
    }
    this.tokens.set(token.id, token)
    return token
  }

  lookup(id: string | undefined): IssuedToken | undefined {
    if (!id) return undefined
    const token = this.tokens.get(id)
    if (!token || Date.parse(token.expires) <= Date.now()) {
      return undefined
    }
    return token
  }

  revokeAll(): void {
    this.tokens.clear()
  }
}
