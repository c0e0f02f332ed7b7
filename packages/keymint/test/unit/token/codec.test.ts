import { describe, it, expect } from 'vitest'
import {
  decodeTokenClaims,
  decodeTokenHeader,
  parseTokenClaims,
  splitToken,
} from '../../../src/token/codec.js'
import { MalformedTokenError } from '../../../src/errors.js'

function segment(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url')
}

function makeToken(header: unknown, payload: unknown, signature = 'c2ln'): string {
  return `${segment(header)}.${segment(payload)}.${signature}`
}

const HEADER = { alg: 'RS256', kid: 'key-1', typ: 'JWT' }
const CLAIMS = { sub: 'alice', iat: 1_700_000_000, exp: 1_700_000_600 }

function reasonOf(fn: () => unknown): string | undefined {
  try {
    fn()
  } catch (err) {
    if (err instanceof MalformedTokenError) return err.reason
    throw err
  }
  return undefined
}

describe('splitToken', () => {
  it('returns the three segments', () => {
    expect(splitToken('aaa.bbb.ccc')).toEqual(['aaa', 'bbb', 'ccc'])
  })

  it('rejects the wrong number of segments', () => {
    expect(() => splitToken('aaa.bbb')).toThrow(MalformedTokenError)
    expect(() => splitToken('aaa.bbb')).toThrow('expected 3 parts, got 2')
    expect(reasonOf(() => splitToken('a.b.c.d.e'))).toBe('segments')
  })

  it('rejects empty segments', () => {
    expect(reasonOf(() => splitToken('aaa..ccc'))).toBe('encoding')
  })

  it('rejects characters outside the base64url alphabet', () => {
    expect(reasonOf(() => splitToken('aa+a.bbb.ccc'))).toBe('encoding')
    expect(reasonOf(() => splitToken('aaa.bbb.cc='))).toBe('encoding')
  })
})

describe('decodeTokenHeader', () => {
  it('returns alg and kid', () => {
    expect(decodeTokenHeader(makeToken(HEADER, CLAIMS))).toEqual(HEADER)
  })

  it('rejects a header that is not JSON', () => {
    const token = `${Buffer.from('not json').toString('base64url')}.${segment(CLAIMS)}.c2ln`
    expect(() => decodeTokenHeader(token)).toThrow('Token header is not valid JSON')
  })

  it('rejects a header that is not an object', () => {
    expect(() => decodeTokenHeader(makeToken(['RS256'], CLAIMS))).toThrow(
      'Token header must be a JSON object',
    )
  })

  it('rejects unsupported algorithms', () => {
    expect(() => decodeTokenHeader(makeToken({ ...HEADER, alg: 'none' }, CLAIMS))).toThrow(
      'Unsupported token algorithm: none',
    )
  })

  it('rejects a missing kid', () => {
    expect(() => decodeTokenHeader(makeToken({ alg: 'RS256' }, CLAIMS))).toThrow(
      'Token header has no kid',
    )
    expect(reasonOf(() => decodeTokenHeader(makeToken({ alg: 'RS256', kid: '' }, CLAIMS)))).toBe(
      'header',
    )
  })
})

describe('parseTokenClaims', () => {
  it('accepts a complete claim set and drops unknown members', () => {
    expect(parseTokenClaims({ ...CLAIMS, extra: true })).toEqual(CLAIMS)
  })

  it('returns undefined for missing or mistyped members', () => {
    expect(parseTokenClaims(null)).toBeUndefined()
    expect(parseTokenClaims({ ...CLAIMS, sub: 42 })).toBeUndefined()
    expect(parseTokenClaims({ sub: 'alice', iat: 1 })).toBeUndefined()
    expect(parseTokenClaims({ ...CLAIMS, iat: '1700000000' })).toBeUndefined()
  })
})

describe('decodeTokenClaims', () => {
  it('returns the claims', () => {
    expect(decodeTokenClaims(makeToken(HEADER, CLAIMS))).toEqual(CLAIMS)
  })

  it('rejects payloads that do not match the schema', () => {
    expect(() => decodeTokenClaims(makeToken(HEADER, { sub: 'alice' }))).toThrow(
      'Token payload does not match the claim schema',
    )
  })

  it('rejects payloads that are not JSON', () => {
    const token = `${segment(HEADER)}.${Buffer.from('{').toString('base64url')}.c2ln`
    expect(reasonOf(() => decodeTokenClaims(token))).toBe('payload')
  })
})
