/**
 * Token issuance and validation against {@link KeyStore}-managed keys.
 */

import { CompactSign, compactVerify, errors } from 'jose'
import { MalformedTokenError } from '../errors.js'
import type { KeyStore } from '../keys/store.js'
import type { KeyRecord } from '../keys/types.js'
import { isWithinWindow } from '../keys/window.js'
import type {
  IssueRequest,
  IssueResult,
  TokenClaims,
  TokenHeader,
  ValidationResult,
  Verdict,
} from '../types.js'
import { toEpochSeconds } from '../util/clock.js'
import type { Clock } from '../util/clock.js'
import { decodeTokenClaims, decodeTokenHeader } from './codec.js'

const DEFAULT_TTL_MS = 10 * 60 * 1000

/** Options for constructing a {@link TokenService}. */
export interface TokenServiceOptions {
  /** Time source. Defaults to the key store's clock. */
  clock?: Clock | undefined
  /** Lifetime used when {@link IssueRequest.ttlMs} is omitted. */
  defaultTtlMs?: number | undefined
}

/**
 * Signs tokens with the key chosen by the store's selection policy and
 * classifies tokens presented back to it.
 */
export class TokenService {
  readonly #keyStore: KeyStore
  readonly #clock: Clock
  readonly #defaultTtlMs: number

  constructor(keyStore: KeyStore, options?: TokenServiceOptions) {
    this.#keyStore = keyStore
    this.#clock = options?.clock ?? keyStore.clock
    this.#defaultTtlMs = options?.defaultTtlMs ?? DEFAULT_TTL_MS
  }

  /**
   * Issue a token for `subject`.
   *
   * With `forceExpiredKey` the token is signed with a key whose window has
   * already elapsed, so it validates as `key-expired-at-issuance`.
   *
   * @throws {NoValidKeyError} if no key is valid and an expired one was not requested.
   * @throws {KeyGenerationError} if an expired key had to be generated and generation failed.
   */
  async issue(request: IssueRequest): Promise<IssueResult> {
    if (request.subject === '') {
      throw new RangeError('subject must be a non-empty string')
    }
    const ttlMs = request.ttlMs ?? this.#defaultTtlMs
    if (!Number.isFinite(ttlMs) || ttlMs < 0) {
      throw new RangeError(`ttlMs must be a non-negative finite number, got ${String(ttlMs)}`)
    }

    // One instant, on a whole second, decides both the key and `iat`.
    const iat = toEpochSeconds(this.#clock.now())
    const key = await this.#keyStore.selectSigningKey(request.forceExpiredKey === true, iat * 1000)

    const claims: TokenClaims = {
      sub: request.subject,
      iat,
      exp: iat + Math.floor(ttlMs / 1000),
    }
    const header = { alg: key.algorithm, kid: key.id, typ: 'JWT' } satisfies TokenHeader

    const token = await new CompactSign(new TextEncoder().encode(JSON.stringify(claims)))
      .setProtectedHeader(header)
      .sign(key.privateKey)

    return { token, keyId: key.id, claims }
  }

  /**
   * Classify a token. Invalid but well-formed tokens produce a verdict rather
   * than an error; the store is never modified.
   *
   * @throws {MalformedTokenError} if the token cannot be parsed.
   */
  async validate(token: string): Promise<ValidationResult> {
    const { kid } = decodeTokenHeader(token)
    const claims = decodeTokenClaims(token)

    // Any record, exportable or not, so the verdict can say why a token fails.
    const record = this.#keyStore.findKey(kid)
    if (record === undefined) {
      return { verdict: 'unknown-key', keyId: kid }
    }

    try {
      await compactVerify(token, record.publicKey, { algorithms: [record.algorithm] })
    } catch (err) {
      if (
        err instanceof errors.JWSSignatureVerificationFailed ||
        err instanceof errors.JOSEAlgNotAllowed
      ) {
        return { verdict: 'signature-mismatch', keyId: kid }
      }
      const message = err instanceof Error ? err.message : String(err)
      throw new MalformedTokenError(`Token could not be verified: ${message}`, 'signature')
    }

    return { verdict: this.#classify(claims, record), keyId: kid, subject: claims.sub, claims }
  }

  #classify(claims: TokenClaims, record: KeyRecord): Verdict {
    if (!isWithinWindow(record, claims.iat * 1000)) {
      return 'key-expired-at-issuance'
    }
    if (claims.exp <= toEpochSeconds(this.#clock.now())) {
      return 'token-expired'
    }
    return 'valid'
  }
}
