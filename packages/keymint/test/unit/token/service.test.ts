import { describe, it, expect, vi } from 'vitest'
import { KeyStore } from '../../../src/keys/store.js'
import { TokenService } from '../../../src/token/service.js'
import { decodeTokenClaims, decodeTokenHeader } from '../../../src/token/codec.js'
import { MalformedTokenError, NoValidKeyError } from '../../../src/errors.js'
import { ManualClock } from '@keymint/test-helpers'
import { START_MS, START_SECOND_MS } from '../../helpers/clock.js'

const MINUTE_MS = 60_000
const HOUR_MS = 60 * MINUTE_MS
const DAY_MS = 24 * HOUR_MS
const START_SECONDS = START_SECOND_MS / 1000

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface Fixture {
  clock: ManualClock
  store: KeyStore
  service: TokenService
}

function makeFixture(options?: { algorithm?: 'RS256' | 'ES256' }): Fixture {
  const clock = new ManualClock(START_MS)
  const store = new KeyStore({ clock, algorithm: options?.algorithm })
  return { clock, store, service: new TokenService(store) }
}

/** Flip one bit of the decoded signature and re-encode it. */
function flipSignatureBit(token: string, byteIndex: number, bit: number): string {
  const [header, payload, signature] = token.split('.')
  const bytes = Buffer.from(signature ?? '', 'base64url')
  const index = byteIndex < 0 ? bytes.length + byteIndex : byteIndex
  bytes[index] = (bytes[index] ?? 0) ^ (1 << bit)
  return `${header ?? ''}.${payload ?? ''}.${bytes.toString('base64url')}`
}

function replacePayload(token: string, payload: unknown): string {
  const [header, , signature] = token.split('.')
  const encoded = Buffer.from(JSON.stringify(payload)).toString('base64url')
  return `${header ?? ''}.${encoded}.${signature ?? ''}`
}

function replaceHeader(token: string, header: unknown): string {
  const [, payload, signature] = token.split('.')
  const encoded = Buffer.from(JSON.stringify(header)).toString('base64url')
  return `${encoded}.${payload ?? ''}.${signature ?? ''}`
}

// ---------------------------------------------------------------------------
// issue
// ---------------------------------------------------------------------------

describe('TokenService.issue', () => {
  it('signs with the earliest valid key and reports its identifier', async () => {
    const { store, service } = makeFixture()
    const keyId = await store.generateKey(DAY_MS)
    await store.generateKey(DAY_MS)

    const result = await service.issue({ subject: 'alice', ttlMs: 10 * MINUTE_MS })

    expect(result.keyId).toBe(keyId)
    expect(decodeTokenHeader(result.token)).toEqual({ alg: 'RS256', kid: keyId, typ: 'JWT' })
  })

  it('builds sub, iat and exp claims in seconds', async () => {
    const { store, service } = makeFixture()
    await store.generateKey(DAY_MS)

    const result = await service.issue({ subject: 'alice', ttlMs: 10 * MINUTE_MS })

    const expected = { sub: 'alice', iat: START_SECONDS, exp: START_SECONDS + 600 }
    expect(result.claims).toEqual(expected)
    expect(decodeTokenClaims(result.token)).toEqual(expected)
  })

  it('produces a three-segment compact token', async () => {
    const { store, service } = makeFixture()
    await store.generateKey(DAY_MS)
    const { token } = await service.issue({ subject: 'alice' })
    expect(token.split('.')).toHaveLength(3)
  })

  it('uses a ten minute lifetime by default', async () => {
    const { store, service } = makeFixture()
    await store.generateKey(DAY_MS)
    const { claims } = await service.issue({ subject: 'alice' })
    expect(claims.exp - claims.iat).toBe(600)
  })

  it('honours a configured default lifetime', async () => {
    const clock = new ManualClock(START_MS)
    const store = new KeyStore({ clock, algorithm: 'ES256' })
    const service = new TokenService(store, { defaultTtlMs: 30 * MINUTE_MS })
    await store.generateKey(DAY_MS)
    const { claims } = await service.issue({ subject: 'alice' })
    expect(claims.exp - claims.iat).toBe(1_800)
  })

  it('fails with NoValidKeyError when the store is empty', async () => {
    const { service } = makeFixture()
    await expect(service.issue({ subject: 'alice' })).rejects.toThrow(NoValidKeyError)
  })

  it('signs with an expired key on request without needing a valid one', async () => {
    const { store, service } = makeFixture({ algorithm: 'ES256' })
    const { keyId } = await service.issue({ subject: 'bob', forceExpiredKey: true })
    expect(store.statusOf(keyId)).toBe('expired')
  })

  it('rejects an empty subject', async () => {
    const { store, service } = makeFixture({ algorithm: 'ES256' })
    await store.generateKey(DAY_MS)
    await expect(service.issue({ subject: '' })).rejects.toThrow(RangeError)
  })

  it('rejects a negative lifetime', async () => {
    const { store, service } = makeFixture({ algorithm: 'ES256' })
    await store.generateKey(DAY_MS)
    await expect(service.issue({ subject: 'alice', ttlMs: -1 })).rejects.toThrow(
      'ttlMs must be a non-negative finite number',
    )
  })
})

// ---------------------------------------------------------------------------
// validate: verdicts
// ---------------------------------------------------------------------------

describe('TokenService.validate', () => {
  it('accepts a freshly issued token', async () => {
    const { store, service } = makeFixture()
    const keyId = await store.generateKey(DAY_MS)
    const { token } = await service.issue({ subject: 'alice', ttlMs: 10 * MINUTE_MS })

    expect(await service.validate(token)).toEqual({
      verdict: 'valid',
      keyId,
      subject: 'alice',
      claims: { sub: 'alice', iat: START_SECONDS, exp: START_SECONDS + 600 },
    })
  })

  it('accepts ES256 tokens', async () => {
    const { store, service } = makeFixture({ algorithm: 'ES256' })
    await store.generateKey(DAY_MS)
    const { token } = await service.issue({ subject: 'alice' })
    expect((await service.validate(token)).verdict).toBe('valid')
  })

  it('reports key-expired-at-issuance for tokens signed with an expired key', async () => {
    const { service } = makeFixture()
    const { token, keyId } = await service.issue({ subject: 'bob', forceExpiredKey: true })

    const result = await service.validate(token)
    expect(result.verdict).toBe('key-expired-at-issuance')
    expect(result.keyId).toBe(keyId)
    expect(result.subject).toBe('bob')
  })

  it('reports key-expired-at-issuance regardless of the token lifetime', async () => {
    const { service } = makeFixture({ algorithm: 'ES256' })
    for (const ttlMs of [0, MINUTE_MS, DAY_MS]) {
      const { token } = await service.issue({ subject: 'bob', ttlMs, forceExpiredKey: true })
      expect((await service.validate(token)).verdict).toBe('key-expired-at-issuance')
    }
  })

  it('reports key-expired-at-issuance when reusing a key that lapsed mid-second', async () => {
    const { clock, store, service } = makeFixture({ algorithm: 'ES256' })
    const lapsed = await store.generateKey(1_500)
    clock.advance(1_200)
    expect(store.statusOf(lapsed)).toBe('expired')

    const { token, keyId } = await service.issue({
      subject: 'bob',
      ttlMs: HOUR_MS,
      forceExpiredKey: true,
    })

    expect(keyId).not.toBe(lapsed)
    expect((await service.validate(token)).verdict).toBe('key-expired-at-issuance')
  })

  it('accepts a token issued in the last millisecond of its key', async () => {
    const { clock, store, service } = makeFixture({ algorithm: 'ES256' })
    const keyId = await store.generateKey(2_000)
    clock.set(START_SECOND_MS + 1_999)
    // Time moves past the key window while the token is being signed.
    vi.spyOn(clock, 'now')
      .mockReturnValueOnce(START_SECOND_MS + 1_999)
      .mockReturnValue(START_SECOND_MS + 2_001)

    const issued = await service.issue({ subject: 'alice' })

    expect(issued.keyId).toBe(keyId)
    expect(issued.claims.iat).toBe(START_SECONDS + 1)
    expect((await service.validate(issued.token)).verdict).toBe('valid')
  })

  it('reports token-expired for a zero lifetime', async () => {
    const { store, service } = makeFixture({ algorithm: 'ES256' })
    await store.generateKey(DAY_MS)
    const { token } = await service.issue({ subject: 'alice', ttlMs: 0 })
    expect((await service.validate(token)).verdict).toBe('token-expired')
  })

  it('reports token-expired one hour and one second after a one hour token', async () => {
    const { clock, store, service } = makeFixture({ algorithm: 'ES256' })
    await store.generateKey(DAY_MS)
    const { token } = await service.issue({ subject: 'alice', ttlMs: HOUR_MS })

    clock.set(START_MS + HOUR_MS - 1_000)
    expect((await service.validate(token)).verdict).toBe('valid')

    clock.set(START_MS + HOUR_MS + 1_000)
    const result = await service.validate(token)
    expect(result.verdict).toBe('token-expired')
    expect(result.subject).toBe('alice')
  })

  it('keeps a token valid after its key leaves the public set', async () => {
    const { clock, store, service } = makeFixture({ algorithm: 'ES256' })
    const keyId = await store.generateKey(MINUTE_MS)
    const { token } = await service.issue({ subject: 'alice', ttlMs: HOUR_MS })

    clock.advance(2 * MINUTE_MS)
    expect(store.exportPublicSet().map((d) => d.kid)).not.toContain(keyId)
    expect((await service.validate(token)).verdict).toBe('valid')
  })

  it.each([
    ['first', 0, 0],
    ['middle', 100, 3],
    ['last', -1, 7],
  ])('reports signature-mismatch when a bit of the %s signature byte flips', async (_label, byteIndex, bit) => {
    const { store, service } = makeFixture()
    await store.generateKey(DAY_MS)
    const { token } = await service.issue({ subject: 'alice' })

    const result = await service.validate(flipSignatureBit(token, byteIndex, bit))
    expect(result.verdict).toBe('signature-mismatch')
    expect(result.subject).toBeUndefined()
    expect(result.claims).toBeUndefined()
  })

  it('reports signature-mismatch when the payload is altered', async () => {
    const { store, service } = makeFixture({ algorithm: 'ES256' })
    await store.generateKey(DAY_MS)
    const { token, claims } = await service.issue({ subject: 'alice' })

    const forged = replacePayload(token, { ...claims, sub: 'mallory' })
    expect((await service.validate(forged)).verdict).toBe('signature-mismatch')
  })

  it('reports signature-mismatch when the header algorithm is swapped', async () => {
    const { store, service } = makeFixture()
    const keyId = await store.generateKey(DAY_MS)
    const { token } = await service.issue({ subject: 'alice' })

    const forged = replaceHeader(token, { alg: 'PS256', kid: keyId, typ: 'JWT' })
    expect((await service.validate(forged)).verdict).toBe('signature-mismatch')
  })

  it('reports unknown-key for tokens from another store', async () => {
    const other = makeFixture({ algorithm: 'ES256' })
    await other.store.generateKey(DAY_MS)
    const { token, keyId } = await other.service.issue({ subject: 'alice' })

    const { service } = makeFixture({ algorithm: 'ES256' })
    expect(await service.validate(token)).toEqual({ verdict: 'unknown-key', keyId })
  })

  it('throws MalformedTokenError for tokens that cannot be parsed', async () => {
    const { service } = makeFixture({ algorithm: 'ES256' })
    await expect(service.validate('not-a-token')).rejects.toThrow(MalformedTokenError)
    await expect(service.validate('a.b.c')).rejects.toThrow(MalformedTokenError)
  })

  it('never changes the store', async () => {
    const { store, service } = makeFixture({ algorithm: 'ES256' })
    await store.generateKey(DAY_MS)
    const { token } = await service.issue({ subject: 'alice' })
    await service.validate(token)
    await service.validate(flipSignatureBit(token, 0, 0))
    expect(store.size).toBe(1)
  })
})
