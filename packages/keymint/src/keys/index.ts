/**
 * Key management barrel export.
 */

export { KeyStore } from './store.js'
export { toPublicJwk, describeKey } from './jwk.js'
export { isWithinWindow, hasElapsed, keyStatusAt } from './window.js'
export type { KeyRecord, KeyStoreOptions } from './types.js'
