/**
 * @relaychat/auth
 *
 * Access/refresh token lifecycle and revocation for chat connections.
 */

export { createTokenService } from './tokenService.js'
export type {
  TokenService,
  TokenServiceOptions,
  RevocationListener,
} from './tokenService.js'
export { createMemoryTokenStore } from './memoryTokenStore.js'
export type { MemoryTokenStore, MemoryTokenStoreOptions } from './memoryTokenStore.js'
export type {
  AuthenticatedPrincipal,
  MarkUsedResult,
  RefreshTokenRecord,
  RevocationCheck,
  SessionClaims,
  TokenPair,
  TokenStore,
} from './types.js'
