/**
 * Validity-window checks. A window is the half-open interval
 * `[notBefore, notAfter)`.
 */

import type { KeyStatus } from '../types.js'
import type { KeyRecord } from './types.js'

type Windowed = Pick<KeyRecord, 'notBefore' | 'notAfter'>

/** `true` iff `notBefore <= at < notAfter`. */
export function isWithinWindow(record: Windowed, at: number): boolean {
  return record.notBefore.getTime() <= at && at < record.notAfter.getTime()
}

/** `true` once the window has fully elapsed at `at`. */
export function hasElapsed(record: Windowed, at: number): boolean {
  return record.notAfter.getTime() <= at
}

export function keyStatusAt(record: Windowed, at: number): KeyStatus {
  if (hasElapsed(record, at)) {
    return 'expired'
  }
  return record.notBefore.getTime() <= at ? 'active' : 'pending'
}
