/**
 * Token layer barrel export.
 */

export { TokenService } from './service.js'
export type { TokenServiceOptions } from './service.js'

export { splitToken, decodeTokenHeader, decodeTokenClaims, parseTokenClaims } from './codec.js'
