/**
 * keymint: signed identity tokens and the public key sets that verify them.
 *
 * @packageDocumentation
 */

export {
  KeymintError,
  KeyGenerationError,
  KeyNotFoundError,
  NoValidKeyError,
  MalformedTokenError,
} from './errors.js'

export type {
  SigningAlgorithm,
  KeyStatus,
  RsaPublicJwk,
  EcPublicJwk,
  PublicJwk,
  PublicKeyDescriptor,
  JsonWebKeySet,
  TokenHeader,
  TokenClaims,
  Verdict,
  ValidationResult,
  IssueRequest,
  IssueResult,
  KeymintConfig,
  KeysConfig,
  TokensConfig,
  ServerConfig,
} from './types.js'

export { KeyStore, toPublicJwk, describeKey, isWithinWindow, hasElapsed, keyStatusAt } from './keys/index.js'
export type { KeyRecord, KeyStoreOptions } from './keys/index.js'

export {
  TokenService,
  splitToken,
  decodeTokenHeader,
  decodeTokenClaims,
  parseTokenClaims,
} from './token/index.js'
export type { TokenServiceOptions } from './token/index.js'

export { systemClock, toEpochSeconds } from './util/clock.js'
export type { Clock } from './util/clock.js'

export { KeyMint } from './keymint.js'
export type { KeyMintOptions, IssueOptions } from './keymint.js'

export { loadConfig, defaultConfig, getDefaultConfigDir, validateConfig } from './config.js'
