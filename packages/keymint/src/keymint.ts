/**
 * KeyMint main class. Wires config, the key store and the token service.
 */

import { loadConfig } from './config.js'
import { KeyStore } from './keys/store.js'
import { TokenService } from './token/service.js'
import type {
  IssueResult,
  JsonWebKeySet,
  KeymintConfig,
  ValidationResult,
} from './types.js'
import type { Clock } from './util/clock.js'

const MINUTE_MS = 60_000

/** Options for initializing KeyMint. */
export interface KeyMintOptions {
  /** Override the config directory. */
  configDir?: string | undefined
  /** Supply config directly, skipping file load. */
  config?: KeymintConfig | undefined
  /** Time source shared by the store and the token service. */
  clock?: Clock | undefined
}

/** Options for the issue operation. */
export interface IssueOptions {
  /** Subject identity. Defaults to `tokens.subject` from config. */
  subject?: string | undefined
  /** Token lifetime in milliseconds. Defaults to `tokens.ttlMinutes`. */
  ttlMs?: number | undefined
  /** Sign with an already-expired key. */
  expired?: boolean | undefined
}

/**
 * Main entry point for keymint. Holds one {@link KeyStore} for the lifetime of
 * the process and generates the first signing key during {@link KeyMint.init}.
 */
export class KeyMint {
  readonly #config: KeymintConfig
  readonly #keyStore: KeyStore
  readonly #tokens: TokenService

  private constructor(config: KeymintConfig, keyStore: KeyStore, tokens: TokenService) {
    this.#config = config
    this.#keyStore = keyStore
    this.#tokens = tokens
  }

  /**
   * Initialize a new KeyMint instance: load config, create the store and
   * generate the initial signing key.
   *
   * @throws {KeyGenerationError} if the initial key cannot be generated.
   */
  static async init(options?: KeyMintOptions): Promise<KeyMint> {
    const config = options?.config ?? (await loadConfig(options?.configDir))

    const keyStore = new KeyStore({
      clock: options?.clock,
      algorithm: config.keys.algorithm,
      modulusLength: config.keys.modulusLength,
      expiredSkewMs: config.keys.expiredSkewSeconds * 1000,
    })
    const tokens = new TokenService(keyStore, {
      defaultTtlMs: config.tokens.ttlMinutes * MINUTE_MS,
    })

    const mint = new KeyMint(config, keyStore, tokens)
    await mint.rotateKey()
    return mint
  }

  /** The active configuration. */
  get config(): KeymintConfig {
    return this.#config
  }

  /** The underlying key store. */
  get keyStore(): KeyStore {
    return this.#keyStore
  }

  /** The underlying token service. */
  get tokens(): TokenService {
    return this.#tokens
  }

  /** Issue a token, filling unset options from config. */
  issue(options?: IssueOptions): Promise<IssueResult> {
    return this.#tokens.issue({
      subject: options?.subject ?? this.#config.tokens.subject,
      ttlMs: options?.ttlMs,
      forceExpiredKey: options?.expired,
    })
  }

  /** Classify a token. */
  validate(token: string): Promise<ValidationResult> {
    return this.#tokens.validate(token)
  }

  /** Public-key-set document for `at` (default now). */
  jwks(at?: Date): JsonWebKeySet {
    return this.#keyStore.exportJwks(at)
  }

  /**
   * Generate another signing key valid for `keys.validForMinutes`. The
   * earliest valid key keeps signing until its window closes, after which
   * this one takes over.
   *
   * @returns The new key's identifier.
   */
  rotateKey(): Promise<string> {
    return this.#keyStore.generateKey(this.#config.keys.validForMinutes * MINUTE_MS)
  }
}
