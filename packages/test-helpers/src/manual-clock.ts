/**
 * Hand-driven clock for tests.
 */

import type { Clock } from 'keymint'

/**
 * A {@link Clock} that only moves when told to.
 *
 * @example
 * ```ts
 * const clock = new ManualClock(new Date('2024-01-01T00:00:00Z'))
 * const store = new KeyStore({ clock })
 * clock.advance(60_000)
 * ```
 *
 * @public
 */
export class ManualClock implements Clock {
  #current: number

  constructor(start: Date | number = Date.now()) {
    this.#current = typeof start === 'number' ? start : start.getTime()
  }

  /** @public */
  now(): number {
    return this.#current
  }

  /**
   * Move the clock forward by `ms` milliseconds.
   * @public
   */
  advance(ms: number): void {
    if (ms < 0) {
      throw new RangeError('ManualClock cannot move backwards; use set() instead')
    }
    this.#current += ms
  }

  /**
   * Jump to an absolute instant.
   * @public
   */
  set(instant: Date | number): void {
    this.#current = typeof instant === 'number' ? instant : instant.getTime()
  }
}
