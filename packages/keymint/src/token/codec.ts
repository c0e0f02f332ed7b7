/**
 * Structural decoding of compact tokens, without any signature check.
 * @internal
 */

import { MalformedTokenError } from '../errors.js'
import type { SigningAlgorithm, TokenClaims, TokenHeader } from '../types.js'

const SEGMENT_COUNT = 3
const BASE64URL = /^[A-Za-z0-9_-]+$/
const ALGORITHMS: ReadonlySet<string> = new Set<SigningAlgorithm>(['RS256', 'PS256', 'ES256'])

/**
 * Type guard that checks whether an unknown value is a non-null object.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isSigningAlgorithm(value: unknown): value is SigningAlgorithm {
  return typeof value === 'string' && ALGORITHMS.has(value)
}

/** Split a compact token into its three non-empty base64url segments. */
export function splitToken(token: string): [string, string, string] {
  const parts = token.split('.')
  if (parts.length !== SEGMENT_COUNT) {
    throw new MalformedTokenError(
      `Invalid compact serialization: expected ${String(SEGMENT_COUNT)} parts, got ${String(parts.length)}`,
      'segments',
    )
  }
  const [header, payload, signature] = parts
  if (header === undefined || payload === undefined || signature === undefined) {
    throw new MalformedTokenError('Invalid compact serialization: missing segment', 'segments')
  }
  for (const segment of parts) {
    if (!BASE64URL.test(segment)) {
      throw new MalformedTokenError(
        'Invalid compact serialization: segment is empty or not Base64URL',
        'encoding',
      )
    }
  }
  return [header, payload, signature]
}

function decodeJsonSegment(segment: string, reason: string): unknown {
  try {
    return JSON.parse(Buffer.from(segment, 'base64url').toString('utf-8'))
  } catch {
    throw new MalformedTokenError(`Token ${reason} is not valid JSON`, reason)
  }
}

/**
 * Decode and check the protected header.
 *
 * @throws {MalformedTokenError} if the header is not JSON or lacks a string
 *   `kid` or a supported `alg`.
 */
export function decodeTokenHeader(token: string): TokenHeader {
  const [headerSegment] = splitToken(token)
  const header = decodeJsonSegment(headerSegment, 'header')
  if (!isObject(header)) {
    throw new MalformedTokenError('Token header must be a JSON object', 'header')
  }

  const { alg, kid } = header
  if (!isSigningAlgorithm(alg)) {
    throw new MalformedTokenError(`Unsupported token algorithm: ${String(alg)}`, 'header')
  }
  if (typeof kid !== 'string' || kid === '') {
    throw new MalformedTokenError('Token header has no kid', 'header')
  }
  return { alg, kid, typ: 'JWT' }
}

/**
 * Parses a raw claims object, returning `undefined` if a required field is
 * missing or mistyped.
 */
export function parseTokenClaims(raw: unknown): TokenClaims | undefined {
  if (!isObject(raw)) {
    return undefined
  }

  const { sub, iat, exp } = raw

  if (typeof sub !== 'string') return undefined
  if (typeof iat !== 'number' || !Number.isFinite(iat)) return undefined
  if (typeof exp !== 'number' || !Number.isFinite(exp)) return undefined

  return { sub, iat, exp }
}

/**
 * Decode the payload segment into claims. Does not verify anything.
 *
 * @throws {MalformedTokenError} if the payload does not match the claim schema.
 */
export function decodeTokenClaims(token: string): TokenClaims {
  const [, payloadSegment] = splitToken(token)
  const claims = parseTokenClaims(decodeJsonSegment(payloadSegment, 'payload'))
  if (claims === undefined) {
    throw new MalformedTokenError('Token payload does not match the claim schema', 'payload')
  }
  return claims
}
