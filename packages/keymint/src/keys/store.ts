/**
 * In-memory key store for keymint: generation, validity-window tracking,
 * signing-key selection and public-key-set export.
 */

import * as crypto from 'node:crypto'
import { generateKeyPair } from 'jose'
import type { GenerateKeyPairOptions, GenerateKeyPairResult, KeyLike } from 'jose'
import { KeyGenerationError, KeyNotFoundError, NoValidKeyError } from '../errors.js'
import type { JsonWebKeySet, KeyStatus, PublicKeyDescriptor, SigningAlgorithm } from '../types.js'
import { systemClock } from '../util/clock.js'
import type { Clock } from '../util/clock.js'
import { describeKey, toPublicJwk } from './jwk.js'
import type { KeyRecord, KeyStoreOptions } from './types.js'
import { hasElapsed, isWithinWindow, keyStatusAt } from './window.js'

const DEFAULT_MODULUS_LENGTH = 2048
const DEFAULT_EXPIRED_SKEW_MS = 60_000

/**
 * Owns every keypair for the lifetime of the process.
 *
 * Records are never removed. Expired keys drop out of {@link exportPublicSet}
 * but stay resolvable through {@link getKey}, so a token signed with a key
 * that has since lapsed can still be traced to it.
 *
 * Reads are synchronous and only ever see fully built records. Writes run one
 * at a time through an internal queue.
 */
export class KeyStore {
  readonly #keys = new Map<string, KeyRecord>()
  readonly #clock: Clock
  readonly #algorithm: SigningAlgorithm
  readonly #modulusLength: number
  readonly #expiredSkewMs: number
  #sequence = 0
  #writeTail: Promise<unknown> = Promise.resolve()

  constructor(options?: KeyStoreOptions) {
    this.#clock = options?.clock ?? systemClock
    this.#algorithm = options?.algorithm ?? 'RS256'
    this.#modulusLength = options?.modulusLength ?? DEFAULT_MODULUS_LENGTH
    this.#expiredSkewMs = options?.expiredSkewMs ?? DEFAULT_EXPIRED_SKEW_MS
  }

  /** The time source windows are evaluated against. */
  get clock(): Clock {
    return this.#clock
  }

  get algorithm(): SigningAlgorithm {
    return this.#algorithm
  }

  /** Number of records held, expired ones included. */
  get size(): number {
    return this.#keys.size
  }

  /**
   * Generate a keypair valid from now for `validForMs` milliseconds.
   *
   * @returns The new key's identifier.
   * @throws {KeyGenerationError} if the crypto primitive fails.
   */
  async generateKey(validForMs: number): Promise<string> {
    assertDuration(validForMs, 'validForMs')
    const record = await this.#exclusive(() => {
      const notBefore = this.#windowStart()
      return this.#generate(notBefore, notBefore + validForMs)
    })
    return record.id
  }

  /**
   * Generate a keypair whose window has already elapsed, for building
   * deliberately invalid tokens.
   */
  async generateExpiredKey(): Promise<string> {
    const record = await this.#exclusive(() => this.#generateExpired(this.#windowStart()))
    return record.id
  }

  /**
   * Exact lookup, regardless of whether the key is still valid.
   *
   * @throws {KeyNotFoundError} if no record has this identifier.
   */
  getKey(id: string): KeyRecord {
    const record = this.#keys.get(id)
    if (record === undefined) {
      throw new KeyNotFoundError(`No key with id '${id}'`, id)
    }
    return record
  }

  /** Non-throwing variant of {@link getKey}. */
  findKey(id: string): KeyRecord | undefined {
    return this.#keys.get(id)
  }

  /**
   * Pick the key that should back a new token issued at `at` (epoch
   * milliseconds, default now).
   *
   * With `wantExpired`, returns the most recently created key whose window
   * has elapsed by `at`, generating one that ended before `at` if none
   * exists. Otherwise returns the earliest created key valid at `at`.
   *
   * @throws {NoValidKeyError} if `wantExpired` is false and no key is valid.
   */
  async selectSigningKey(wantExpired: boolean, at?: number): Promise<KeyRecord> {
    if (wantExpired) {
      // The lookup and the generation share one turn of the write queue so
      // concurrent callers cannot both decide to generate.
      return this.#exclusive(() => {
        const instant = at ?? this.#clock.now()
        const existing = this.#latestElapsed(instant)
        return existing !== undefined
          ? Promise.resolve(existing)
          : this.#generateExpired(Math.min(instant, this.#windowStart()))
      })
    }

    const instant = at ?? this.#clock.now()
    for (const record of this.#keys.values()) {
      if (isWithinWindow(record, instant)) {
        return record
      }
    }
    throw new NoValidKeyError('No keys available')
  }

  /**
   * Public material for every key valid at `at`, in creation order.
   * Pure with respect to the store: repeated calls with the same instant and
   * no intervening generation return equal sequences.
   */
  exportPublicSet(at?: Date): PublicKeyDescriptor[] {
    const instant = at?.getTime() ?? this.#clock.now()
    const descriptors: PublicKeyDescriptor[] = []
    // Map iteration follows insertion order, which is creation order.
    for (const record of this.#keys.values()) {
      if (isWithinWindow(record, instant)) {
        descriptors.push(describeKey(record))
      }
    }
    return descriptors
  }

  /** The public-key-set document for `at`. */
  exportJwks(at?: Date): JsonWebKeySet {
    return { keys: this.exportPublicSet(at) }
  }

  /**
   * Lifecycle status of a key at `at`.
   *
   * @throws {KeyNotFoundError} if no record has this identifier.
   */
  statusOf(id: string, at?: Date): KeyStatus {
    return keyStatusAt(this.getKey(id), at?.getTime() ?? this.#clock.now())
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  #exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.#writeTail.then(task)
    // The caller receives the rejection through `run`; the queue itself only
    // needs to settle before the next writer starts.
    this.#writeTail = run.catch(() => undefined)
    return run
  }

  /** Current time truncated to a whole second, so windows line up with `iat`. */
  #windowStart(): number {
    return Math.floor(this.#clock.now() / 1000) * 1000
  }

  #latestElapsed(now: number): KeyRecord | undefined {
    let latest: KeyRecord | undefined
    for (const record of this.#keys.values()) {
      if (hasElapsed(record, now)) {
        latest = record
      }
    }
    return latest
  }

  /** Generate a key whose window closed `skew` before `end`. */
  #generateExpired(end: number): Promise<KeyRecord> {
    return this.#generate(end - 2 * this.#expiredSkewMs, end - this.#expiredSkewMs)
  }

  async #generate(notBefore: number, notAfter: number): Promise<KeyRecord> {
    const algorithm = this.#algorithm
    const options: GenerateKeyPairOptions =
      algorithm === 'ES256'
        ? { extractable: true }
        : { modulusLength: this.#modulusLength, extractable: true }

    let pair: GenerateKeyPairResult<KeyLike>
    try {
      pair = await generateKeyPair(algorithm, options)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new KeyGenerationError(`Failed to generate ${algorithm} keypair: ${message}`, algorithm)
    }

    const publicJwk = await toPublicJwk(pair.publicKey, algorithm)

    let id = crypto.randomUUID()
    while (this.#keys.has(id)) {
      id = crypto.randomUUID()
    }

    const record: KeyRecord = {
      id,
      algorithm,
      privateKey: pair.privateKey,
      publicKey: pair.publicKey,
      publicJwk,
      notBefore: new Date(notBefore),
      notAfter: new Date(notAfter),
      sequence: this.#sequence++,
    }
    this.#keys.set(id, record)
    return record
  }
}

function assertDuration(value: number, label: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(`${label} must be a non-negative finite number, got ${String(value)}`)
  }
}
