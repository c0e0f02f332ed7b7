/**
 * @keymint/test-helpers: test utilities for keymint consumers.
 *
 * @packageDocumentation
 */

export { ManualClock } from './manual-clock.js'
export { TestAuthority } from './test-authority.js'
export type { TestAuthorityOptions } from './test-authority.js'
