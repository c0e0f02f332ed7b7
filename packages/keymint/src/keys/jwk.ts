/**
 * Public key material serialization.
 * @internal
 */

import { exportJWK } from 'jose'
import type { KeyLike } from 'jose'
import { KeyGenerationError } from '../errors.js'
import type { PublicJwk, PublicKeyDescriptor } from '../types.js'
import type { KeyRecord } from './types.js'

/**
 * Export the public half of a key as JWK parameters.
 *
 * Only public members are copied, so a private key passed by mistake cannot
 * leak `d`, `p`, `q` or the CRT parameters.
 *
 * @throws {KeyGenerationError} if the export lacks the expected parameters.
 */
export async function toPublicJwk(key: KeyLike, algorithm: string): Promise<PublicJwk> {
  const jwk = await exportJWK(key)

  if (jwk.kty === 'RSA' && typeof jwk.n === 'string' && typeof jwk.e === 'string') {
    return { kty: 'RSA', n: jwk.n, e: jwk.e }
  }
  if (
    jwk.kty === 'EC' &&
    typeof jwk.crv === 'string' &&
    typeof jwk.x === 'string' &&
    typeof jwk.y === 'string'
  ) {
    return { kty: 'EC', crv: jwk.crv, x: jwk.x, y: jwk.y }
  }
  throw new KeyGenerationError(
    `Exported key has no usable public parameters (kty: ${String(jwk.kty)})`,
    algorithm,
  )
}

/** Build the exported descriptor for a key record. */
export function describeKey(record: KeyRecord): PublicKeyDescriptor {
  return {
    ...record.publicJwk,
    kid: record.id,
    alg: record.algorithm,
    use: 'sig',
  }
}
