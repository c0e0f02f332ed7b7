/**
 * Key management types for keymint.
 */

import type { KeyLike } from 'jose'
import type { Clock } from '../util/clock.js'
import type { PublicJwk, SigningAlgorithm } from '../types.js'

/**
 * A generated keypair with its validity window. Immutable once stored.
 */
export interface KeyRecord {
  /** Unique identifier, carried as `kid` in token headers */
  readonly id: string
  readonly algorithm: SigningAlgorithm
  /** Private half; never leaves the store except to sign */
  readonly privateKey: KeyLike
  readonly publicKey: KeyLike
  readonly publicJwk: PublicJwk
  /** Start of the validity window (inclusive) */
  readonly notBefore: Date
  /** End of the validity window (exclusive) */
  readonly notAfter: Date
  /** Creation order within the store */
  readonly sequence: number
}

/**
 * Options for constructing a {@link KeyStore}.
 */
export interface KeyStoreOptions {
  /** Time source. Defaults to the system clock. */
  clock?: Clock | undefined
  /** Algorithm for generated keys. Defaults to `RS256`. */
  algorithm?: SigningAlgorithm | undefined
  /** RSA modulus length in bits. Defaults to 2048. */
  modulusLength?: number | undefined
  /**
   * How far in the past deliberately expired keys end, in milliseconds.
   * Defaults to 60 seconds.
   */
  expiredSkewMs?: number | undefined
}
