/**
 * Tests for the token service: issuance, validation, rotation with replay
 * detection, and revocation.
 */

import { describe, it, expect, vi } from 'vitest'
import jwt from 'jsonwebtoken'
import { ChatError, silentLogger } from '@relaychat/core'
import type { Logger, RevocationSubject } from '@relaychat/core'
import { createMemoryTokenStore, createTokenService } from '@relaychat/auth'
import type { MemoryTokenStore, TokenServiceOptions } from '@relaychat/auth'
import { ACCESS_SECRET, REFRESH_SECRET, createDirectory, principal } from './fixtures.js'

const START = 1_700_000_000_000

function setup(overrides: Partial<TokenServiceOptions> = {}) {
  let clock = START
  const store: MemoryTokenStore = createMemoryTokenStore()
  const directory = createDirectory()
  const tokens = createTokenService({
    accessSecret: ACCESS_SECRET,
    refreshSecret: REFRESH_SECRET,
    store,
    directory,
    now: () => clock,
    logger: silentLogger,
    ...overrides,
  })
  return {
    tokens,
    store,
    directory,
    advance(ms: number) {
      clock += ms
    },
  }
}

async function codeOf(promise: Promise<unknown>): Promise<string> {
  try {
    await promise
  } catch (err) {
    if (err instanceof ChatError) return err.code
    throw err
  }
  throw new Error('expected a rejection')
}

describe('createTokenService', () => {
  it('refuses identical access and refresh secrets', () => {
    expect(() =>
      createTokenService({
        accessSecret: 'test-secret',
        refreshSecret: 'test-secret',
        store: createMemoryTokenStore(),
        directory: createDirectory(),
      }),
    ).toThrow('[chat] accessSecret and refreshSecret must be different')
  })

  describe('issue / validateAccess', () => {
    it('round-trips the principal and session claims', async () => {
      const { tokens } = setup()
      const pair = await tokens.issue(principal('alice'))

      const auth = await tokens.validateAccess(pair.accessToken)
      expect(auth.principal).toEqual(principal('alice'))
      expect(auth.session.chainId).toBe(pair.chainId)
      expect(auth.session.issuedAt).toBe(START / 1000)
      expect(auth.session.expiresAt).toBe(START / 1000 + 1800)
      expect(pair.accessExpiresAt).toBe(START / 1000 + 1800)
      expect(pair.refreshExpiresAt).toBe(START / 1000 + 604_800)
    })

    it('records the refresh token as the first of its chain', async () => {
      const { tokens, store } = setup()
      const pair = await tokens.issue(principal('alice'))
      const claims = jwt.decode(pair.refreshToken)
      if (!claims || typeof claims === 'string' || typeof claims.jti !== 'string') {
        throw new Error('refresh token has no jti')
      }
      expect(store.get(claims.jti)).toEqual({
        tokenId: claims.jti,
        principalId: 'alice',
        chainId: pair.chainId,
        parentId: null,
        issuedAt: START / 1000,
        expiresAt: START / 1000 + 604_800,
        used: false,
      })
    })

    it('accepts a token within the clock tolerance and rejects it after', async () => {
      const { tokens, advance } = setup()
      const pair = await tokens.issue(principal('alice'))

      advance(1804 * 1000)
      await expect(tokens.validateAccess(pair.accessToken)).resolves.toBeDefined()

      advance(2 * 1000)
      expect(await codeOf(tokens.validateAccess(pair.accessToken))).toBe('AuthExpired')
    })

    it('rejects garbage and tokens of the wrong kind as AuthInvalid', async () => {
      const { tokens } = setup()
      const pair = await tokens.issue(principal('alice'))

      expect(await codeOf(tokens.validateAccess('not.a.token'))).toBe('AuthInvalid')
      expect(await codeOf(tokens.validateAccess(pair.refreshToken))).toBe('AuthInvalid')
      expect(await codeOf(tokens.rotate(pair.accessToken))).toBe('AuthInvalid')
    })

    it('rejects a correctly signed token with malformed claims', async () => {
      const { tokens } = setup()
      const forged = jwt.sign({ sub: 'alice', typ: 'access' }, ACCESS_SECRET)
      expect(await codeOf(tokens.validateAccess(forged))).toBe('AuthInvalid')
    })

    it('rejects tokens of a principal removed from the directory once the cache is dropped', async () => {
      const { tokens, directory } = setup()
      const pair = await tokens.issue(principal('alice'))
      directory.remove('alice')

      await expect(tokens.validateAccess(pair.accessToken)).resolves.toBeDefined()

      tokens.invalidatePrincipal('alice')
      expect(await codeOf(tokens.validateAccess(pair.accessToken))).toBe('AuthInvalid')
    })
  })

  describe('rotate', () => {
    it('issues a new pair on the same chain', async () => {
      const { tokens, advance } = setup()
      const first = await tokens.issue(principal('bob'))
      advance(60_000)

      const second = await tokens.rotate(first.refreshToken)
      expect(second.chainId).toBe(first.chainId)
      expect(second.refreshToken).not.toBe(first.refreshToken)

      const auth = await tokens.validateAccess(second.accessToken)
      expect(auth.principal.id).toBe('bob')
      expect(auth.session.issuedAt).toBe(START / 1000 + 60)

      const third = await tokens.rotate(second.refreshToken)
      expect(third.chainId).toBe(first.chainId)
    })

    it('treats a second redemption as replay and revokes the chain', async () => {
      const { tokens } = setup()
      const revoked: RevocationSubject[] = []
      tokens.onRevoke((subject) => revoked.push(subject))

      const first = await tokens.issue(principal('bob'))
      const second = await tokens.rotate(first.refreshToken)

      expect(await codeOf(tokens.rotate(first.refreshToken))).toBe('TokenReplay')
      expect(revoked).toEqual([{ kind: 'chain', chainId: first.chainId }])
      expect(await codeOf(tokens.validateAccess(second.accessToken))).toBe('AuthRevoked')
      expect(await codeOf(tokens.rotate(second.refreshToken))).toBe('AuthRevoked')
    })

    it('lets exactly one of two concurrent redemptions win and then revokes its chain', async () => {
      const { tokens } = setup()
      const revoked: RevocationSubject[] = []
      tokens.onRevoke((subject) => revoked.push(subject))
      const first = await tokens.issue(principal('bob'))

      const results = await Promise.allSettled([
        tokens.rotate(first.refreshToken),
        tokens.rotate(first.refreshToken),
      ])

      const winners = results.flatMap((r) => (r.status === 'fulfilled' ? [r.value] : []))
      expect(winners).toHaveLength(1)
      const failures = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []))
      expect(failures).toHaveLength(1)
      expect(isChatErrorWithCode(failures[0], 'TokenReplay')).toBe(true)

      expect(revoked).toEqual([{ kind: 'chain', chainId: first.chainId }])
      const [winner] = winners
      if (!winner) throw new Error('no winning rotation')
      expect(await codeOf(tokens.validateAccess(winner.accessToken))).toBe('AuthRevoked')
      expect(await codeOf(tokens.rotate(winner.refreshToken))).toBe('AuthRevoked')
    })

    it('rejects an expired refresh token as AuthExpired', async () => {
      const { tokens, store, advance } = setup()
      const pair = await tokens.issue(principal('bob'))
      const claims = jwt.decode(pair.refreshToken)
      if (!claims || typeof claims === 'string' || typeof claims.jti !== 'string') {
        throw new Error('refresh token has no jti')
      }

      advance((604_800 + 6) * 1000)

      expect(await codeOf(tokens.rotate(pair.refreshToken))).toBe('AuthExpired')
      expect(store.get(claims.jti)?.used).toBe(false)
    })

    it('rejects a refresh token the store never recorded', async () => {
      const issuer = setup()
      const other = setup()
      const pair = await issuer.tokens.issue(principal('bob'))
      expect(await codeOf(other.tokens.rotate(pair.refreshToken))).toBe('AuthInvalid')
    })

    it('reloads the principal from the directory', async () => {
      const { tokens, directory } = setup()
      const pair = await tokens.issue(principal('bob'))
      directory.remove('bob')
      expect(await codeOf(tokens.rotate(pair.refreshToken))).toBe('AuthInvalid')
    })
  })

  describe('revoke', () => {
    it('revokes a principal up to the revocation time only', async () => {
      const { tokens, advance } = setup()
      const before = await tokens.issue(principal('carol'))
      await tokens.revoke({ kind: 'principal', principalId: 'carol' })

      expect(await codeOf(tokens.validateAccess(before.accessToken))).toBe('AuthRevoked')
      expect(await codeOf(tokens.rotate(before.refreshToken))).toBe('AuthRevoked')

      // A fresh login within the same second is not caught by the revocation.
      advance(1)
      const after = await tokens.issue(principal('carol'))
      await expect(tokens.validateAccess(after.accessToken)).resolves.toBeDefined()
      await expect(tokens.rotate(after.refreshToken)).resolves.toBeDefined()
    })

    it('revokes a single access token by id', async () => {
      const { tokens } = setup()
      const pair = await tokens.issue(principal('carol'))
      const { session } = await tokens.validateAccess(pair.accessToken)

      await tokens.revoke({ kind: 'token', tokenId: session.tokenId })
      expect(await codeOf(tokens.validateAccess(pair.accessToken))).toBe('AuthRevoked')
    })

    it('notifies listeners until they unsubscribe', async () => {
      const { tokens } = setup()
      const listener = vi.fn()
      const stop = tokens.onRevoke(listener)

      await tokens.revoke({ kind: 'principal', principalId: 'carol' })
      stop()
      await tokens.revoke({ kind: 'principal', principalId: 'bob' })

      expect(listener).toHaveBeenCalledTimes(1)
      expect(listener).toHaveBeenCalledWith({ kind: 'principal', principalId: 'carol' })
    })

    it('logs a failing listener and keeps notifying the rest', async () => {
      const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
      const { tokens } = setup({ logger })
      const second = vi.fn()
      tokens.onRevoke(() => {
        throw new Error('listener broke')
      })
      tokens.onRevoke(second)

      await tokens.revoke({ kind: 'chain', chainId: 'c1' })

      expect(second).toHaveBeenCalledTimes(1)
      expect(logger.error).toHaveBeenCalledWith('revocation listener failed', {
        error: 'listener broke',
      })
    })
  })

  describe('logout', () => {
    it('revokes the whole chain', async () => {
      const { tokens } = setup()
      const pair = await tokens.issue(principal('alice'))
      await tokens.logout(pair.accessToken)

      expect(await codeOf(tokens.validateAccess(pair.accessToken))).toBe('AuthRevoked')
      expect(await codeOf(tokens.rotate(pair.refreshToken))).toBe('AuthRevoked')
    })

    it('accepts an expired access token', async () => {
      const { tokens, advance } = setup()
      const pair = await tokens.issue(principal('alice'))
      advance(3600 * 1000)

      await tokens.logout(pair.accessToken)
      expect(await codeOf(tokens.rotate(pair.refreshToken))).toBe('AuthRevoked')
    })

    it('rejects a token with a bad signature', async () => {
      const { tokens } = setup()
      const forged = jwt.sign({ sub: 'alice' }, 'test-other-secret')
      expect(await codeOf(tokens.logout(forged))).toBe('AuthInvalid')
    })
  })
})

function isChatErrorWithCode(err: unknown, code: string): boolean {
  return err instanceof ChatError && err.code === code
}
