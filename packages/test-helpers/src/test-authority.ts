/**
 * Pre-configured KeyMint for consumer tests.
 */

import type { KeymintConfig } from 'keymint'
import { KeyMint, defaultConfig } from 'keymint'
import { ManualClock } from './manual-clock.js'

/** Fixed start instant so token claims are predictable. */
const TEST_START = new Date('2024-01-01T00:00:00.000Z')

/**
 * Options for creating a {@link TestAuthority}.
 * @public
 */
export interface TestAuthorityOptions {
  /** Clock start. Defaults to 2024-01-01T00:00:00Z. */
  start?: Date | undefined
  /** Override the default token TTL in minutes. */
  ttlMinutes?: number | undefined
  /** Override the signing key lifetime in minutes. */
  keyValidForMinutes?: number | undefined
}

/**
 * A KeyMint instance on a {@link ManualClock}.
 *
 * @remarks
 * Uses ES256 keys, which generate far faster than RSA, so suites that mint
 * many keys stay quick. Nothing is read from disk.
 *
 * @example
 * ```ts
 * const authority = await TestAuthority.create()
 * const { token } = await authority.mint.issue({ subject: 'alice' })
 * authority.clock.advance(11 * 60_000)
 * const { verdict } = await authority.mint.validate(token) // 'token-expired'
 * ```
 *
 * @public
 */
export class TestAuthority {
  /** The underlying KeyMint instance. */
  readonly mint: KeyMint

  /** The clock shared by the store and the token service. */
  readonly clock: ManualClock

  private constructor(mint: KeyMint, clock: ManualClock) {
    this.mint = mint
    this.clock = clock
  }

  /**
   * Create a new TestAuthority with one valid signing key.
   * @public
   */
  static async create(options?: TestAuthorityOptions): Promise<TestAuthority> {
    const clock = new ManualClock(options?.start ?? TEST_START)
    const base = defaultConfig()
    const config: KeymintConfig = {
      ...base,
      keys: {
        ...base.keys,
        algorithm: 'ES256',
        validForMinutes: options?.keyValidForMinutes ?? base.keys.validForMinutes,
      },
      tokens: {
        ...base.tokens,
        ttlMinutes: options?.ttlMinutes ?? base.tokens.ttlMinutes,
      },
    }

    const mint = await KeyMint.init({ config, clock })
    return new TestAuthority(mint, clock)
  }
}
