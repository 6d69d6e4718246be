import jwt from 'jsonwebtoken'
import { randomUUID } from 'crypto'
import { z } from 'zod'
import {
  ChatError,
  consoleLogger,
  createTtlCache,
  describeError,
} from '@relaychat/core'
import type {
  Logger,
  Principal,
  PrincipalDirectory,
  PrincipalId,
  RevocationSubject,
} from '@relaychat/core'
import type {
  AuthenticatedPrincipal,
  RefreshTokenRecord,
  TokenPair,
  TokenStore,
} from './types.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface TokenServiceOptions {
  /** HMAC secret for access tokens. */
  accessSecret: string
  /** HMAC secret for refresh tokens. Must differ from `accessSecret`. */
  refreshSecret: string
  /** Access token lifetime in seconds. Defaults to `1800` (30 minutes). */
  accessTtlSeconds?: number
  /** Refresh token lifetime in seconds. Defaults to `604800` (7 days). */
  refreshTtlSeconds?: number
  /** Allowed clock skew when checking expiry. Defaults to `5`. */
  clockToleranceSeconds?: number
  /** Refresh token records and revocation state. */
  store: TokenStore
  /** Loads the principal named by a token's subject. */
  directory: PrincipalDirectory
  /** How long a loaded principal is reused. Defaults to `60000`. */
  principalCacheTtlMs?: number
  /** Clock source in milliseconds. Defaults to `Date.now`. */
  now?: () => number
  logger?: Logger
}

export type RevocationListener = (subject: RevocationSubject) => void

export interface TokenService {
  /** Start a new token chain for `principal`. */
  issue(principal: Principal): Promise<TokenPair>
  /**
   * Verify an access token's signature, expiry and revocation state.
   * Fails with `AuthExpired`, `AuthInvalid` or `AuthRevoked`.
   */
  validateAccess(token: string): Promise<AuthenticatedPrincipal>
  /**
   * Redeem a refresh token for a new pair. Each refresh token id can be
   * redeemed once; a second redemption fails with `TokenReplay` and revokes
   * the whole chain.
   */
  rotate(refreshToken: string): Promise<TokenPair>
  /** Revoke a principal, a chain or a single token id. */
  revoke(subject: RevocationSubject): Promise<void>
  /**
   * Revoke the chain an access token belongs to (logout). Expired tokens
   * are accepted so that a late logout still ends the session.
   */
  logout(accessToken: string): Promise<void>
  /** Drop a cached principal after a membership or profile change. */
  invalidatePrincipal(principalId: PrincipalId): void
  /** Register a listener for revocations made through this service. */
  onRevoke(listener: RevocationListener): () => void
}

// ---------------------------------------------------------------------------
// Claims
// ---------------------------------------------------------------------------

const ALGORITHM = 'HS256'

const baseClaims = {
  sub: z.string().min(1),
  sid: z.string().min(1),
  jti: z.string().min(1),
  iat: z.number().int(),
  /** Issue time in milliseconds; principal revocation compares against it. */
  iatMs: z.number().int(),
  exp: z.number().int(),
}

const accessClaimsSchema = z.object({
  ...baseClaims,
  typ: z.literal('access'),
  name: z.string(),
})

const refreshClaimsSchema = z.object({
  ...baseClaims,
  typ: z.literal('refresh'),
})

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Creates the token service: short-lived stateless access tokens, single-use
 * refresh tokens chained by rotation, and revocation by principal, chain or
 * token id.
 *
 * @example
 * const tokens = createTokenService({
 *   accessSecret: config.accessTokenSecret,
 *   refreshSecret: config.refreshTokenSecret,
 *   store: createMemoryTokenStore(),
 *   directory: { loadPrincipal: (id) => users.findPrincipal(id) },
 * })
 *
 * // login route
 * const pair = await tokens.issue(principal)
 */
export function createTokenService(options: TokenServiceOptions): TokenService {
  const {
    accessSecret,
    refreshSecret,
    accessTtlSeconds = 1800,
    refreshTtlSeconds = 604_800,
    clockToleranceSeconds = 5,
    store,
    directory,
    principalCacheTtlMs = 60_000,
    now = Date.now,
    logger = consoleLogger('chat:auth'),
  } = options

  if (accessSecret === refreshSecret) {
    throw new Error('[chat] accessSecret and refreshSecret must be different')
  }

  const principals = createTtlCache<Principal>({ ttl: principalCacheTtlMs, now })
  const listeners = new Set<RevocationListener>()

  function nowSeconds(): number {
    return Math.floor(now() / 1000)
  }

  function verify<T>(
    token: string,
    secret: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    verifyOptions: { ignoreExpiration?: boolean } = {},
  ): T {
    let decoded: unknown
    try {
      decoded = jwt.verify(token, secret, {
        algorithms: [ALGORITHM],
        clockTimestamp: nowSeconds(),
        clockTolerance: clockToleranceSeconds,
        ignoreExpiration: verifyOptions.ignoreExpiration,
      })
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) {
        throw new ChatError('AuthExpired', 'Token has expired', { cause: err })
      }
      throw new ChatError('AuthInvalid', 'Token could not be verified', { cause: err })
    }
    const parsed = schema.safeParse(decoded)
    if (!parsed.success) {
      throw new ChatError('AuthInvalid', 'Token claims are malformed')
    }
    return parsed.data
  }

  async function loadPrincipal(principalId: PrincipalId): Promise<Principal> {
    const principal = await principals.getOrLoad(principalId, () =>
      directory.loadPrincipal(principalId),
    )
    if (!principal) {
      throw new ChatError('AuthInvalid', `Principal "${principalId}" no longer exists`)
    }
    return principal
  }

  function mint(
    principal: Principal,
    chainId: string,
    parentId: string | null,
  ): { pair: TokenPair; record: RefreshTokenRecord } {
    const iatMs = now()
    const iat = Math.floor(iatMs / 1000)
    const accessExpiresAt = iat + accessTtlSeconds
    const refreshExpiresAt = iat + refreshTtlSeconds
    const refreshTokenId = randomUUID()

    const accessToken = jwt.sign(
      {
        sub: principal.id,
        sid: chainId,
        jti: randomUUID(),
        typ: 'access',
        name: principal.displayName,
        iat,
        iatMs,
        exp: accessExpiresAt,
      },
      accessSecret,
      { algorithm: ALGORITHM },
    )
    const refreshToken = jwt.sign(
      {
        sub: principal.id,
        sid: chainId,
        jti: refreshTokenId,
        typ: 'refresh',
        iat,
        iatMs,
        exp: refreshExpiresAt,
      },
      refreshSecret,
      { algorithm: ALGORITHM },
    )

    return {
      pair: { accessToken, refreshToken, chainId, accessExpiresAt, refreshExpiresAt },
      record: {
        tokenId: refreshTokenId,
        principalId: principal.id,
        chainId,
        parentId,
        issuedAt: iat,
        expiresAt: refreshExpiresAt,
        used: false,
      },
    }
  }

  async function revoke(subject: RevocationSubject): Promise<void> {
    await store.revoke(subject, now())
    for (const listener of listeners) {
      try {
        listener(subject)
      } catch (err) {
        logger.error('revocation listener failed', describeError(err))
      }
    }
  }

  return {
    async issue(principal) {
      principals.set(principal.id, principal)
      const { pair, record } = mint(principal, randomUUID(), null)
      await store.recordRefreshToken(record)
      return pair
    },

    async validateAccess(token) {
      const claims = verify(token, accessSecret, accessClaimsSchema)
      const revoked = await store.isRevoked({
        principalId: claims.sub,
        chainId: claims.sid,
        tokenId: claims.jti,
        issuedAtMs: claims.iatMs,
      })
      if (revoked) {
        throw new ChatError('AuthRevoked', 'Token has been revoked')
      }
      const principal = await loadPrincipal(claims.sub)
      return {
        principal,
        session: {
          tokenId: claims.jti,
          chainId: claims.sid,
          issuedAt: claims.iat,
          expiresAt: claims.exp,
        },
      }
    },

    async rotate(refreshToken) {
      const claims = verify(refreshToken, refreshSecret, refreshClaimsSchema)
      const revoked = await store.isRevoked({
        principalId: claims.sub,
        chainId: claims.sid,
        tokenId: claims.jti,
        issuedAtMs: claims.iatMs,
      })
      if (revoked) {
        throw new ChatError('AuthRevoked', 'Token chain has been revoked')
      }

      // Rotation refreshes the principal from the directory.
      principals.delete(claims.sub)
      const principal = await loadPrincipal(claims.sub)

      const { pair, record } = mint(principal, claims.sid, claims.jti)
      const result = await store.markUsed(claims.jti, record)
      switch (result.status) {
        case 'rotated':
          return pair
        case 'unknown':
          throw new ChatError('AuthInvalid', 'Refresh token is not recognised')
        case 'already-used':
          logger.warn('refresh token replay detected, revoking chain', {
            principalId: claims.sub,
            chainId: claims.sid,
            tokenId: claims.jti,
          })
          await revoke({ kind: 'chain', chainId: claims.sid })
          throw new ChatError('TokenReplay', 'Refresh token has already been used')
      }
    },

    revoke,

    async logout(accessToken) {
      const claims = verify(accessToken, accessSecret, accessClaimsSchema, {
        ignoreExpiration: true,
      })
      await revoke({ kind: 'chain', chainId: claims.sid })
    },

    invalidatePrincipal(principalId) {
      principals.delete(principalId)
    },

    onRevoke(listener) {
      listeners.add(listener)
      return () => {
        listeners.delete(listener)
      }
    },
  }
}
