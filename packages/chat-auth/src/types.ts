import type { Principal, PrincipalId, RevocationSubject } from '@relaychat/core'

/** Persisted record of one refresh token. */
export interface RefreshTokenRecord {
  readonly tokenId: string
  readonly principalId: PrincipalId
  /** Lineage id shared by every token rotated from one issuance. */
  readonly chainId: string
  /** Token this one was rotated from, `null` for the first of a chain. */
  readonly parentId: string | null
  /** Seconds since epoch. */
  readonly issuedAt: number
  /** Seconds since epoch. */
  readonly expiresAt: number
  readonly used: boolean
}

export type MarkUsedResult =
  | { status: 'rotated'; previous: RefreshTokenRecord }
  | { status: 'already-used'; previous: RefreshTokenRecord }
  | { status: 'unknown' }

/** Claims checked against the revocation state. */
export interface RevocationCheck {
  readonly principalId: PrincipalId
  readonly chainId: string
  readonly tokenId: string
  /** Milliseconds since epoch. */
  readonly issuedAtMs: number
}

/**
 * Storage collaborator for refresh tokens and revocation state.
 *
 * `markUsed` must be a single atomic check-and-set: of two concurrent calls
 * for the same unused id exactly one may return `rotated`. A SQL store does
 * this with `UPDATE ... SET used = true WHERE token_id = $1 AND used = false`
 * and the replacement insert in one transaction.
 */
export interface TokenStore {
  recordRefreshToken(record: RefreshTokenRecord): Promise<void>
  /**
   * Mark `tokenId` used and record `replacement`, in one step.
   * `replacement` is only stored when the result is `rotated`.
   */
  markUsed(tokenId: string, replacement: RefreshTokenRecord): Promise<MarkUsedResult>
  /**
   * `principal` subjects revoke every token issued at or before `at`
   * (milliseconds since epoch); tokens issued later stay valid.
   */
  revoke(subject: RevocationSubject, at: number): Promise<void>
  isRevoked(check: RevocationCheck): Promise<boolean>
}

/** Session claims carried by a verified access token. */
export interface SessionClaims {
  readonly tokenId: string
  readonly chainId: string
  /** Seconds since epoch. */
  readonly issuedAt: number
  /** Seconds since epoch. */
  readonly expiresAt: number
}

export interface AuthenticatedPrincipal {
  readonly principal: Principal
  readonly session: SessionClaims
}

export interface TokenPair {
  readonly accessToken: string
  readonly refreshToken: string
  readonly chainId: string
  /** Seconds since epoch. */
  readonly accessExpiresAt: number
  /** Seconds since epoch. */
  readonly refreshExpiresAt: number
}
