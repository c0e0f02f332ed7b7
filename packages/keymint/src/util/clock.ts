/**
 * Time source abstraction so key windows and token claims can be driven
 * deterministically in tests.
 */

/** A source of the current time in epoch milliseconds. */
export interface Clock {
  now(): number
}

/** Clock backed by `Date.now()`. */
export const systemClock: Clock = {
  now: () => Date.now(),
}

/** Truncate epoch milliseconds to whole seconds. */
export function toEpochSeconds(ms: number): number {
  return Math.floor(ms / 1000)
}
