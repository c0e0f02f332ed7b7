/**
 * Shared types and interfaces for keymint.
 */

/** JWS algorithms a key can be generated for. */
export type SigningAlgorithm = 'RS256' | 'PS256' | 'ES256'

/**
 * Where a key sits relative to its validity window at a given instant.
 * `pending` keys have a `notBefore` in the future.
 */
export type KeyStatus = 'pending' | 'active' | 'expired'

/** RSA public key parameters as they appear in a JWK. */
export interface RsaPublicJwk {
  kty: 'RSA'
  /** Modulus, base64url big-endian */
  n: string
  /** Public exponent, base64url big-endian */
  e: string
}

/** EC public key parameters as they appear in a JWK. */
export interface EcPublicJwk {
  kty: 'EC'
  crv: string
  x: string
  y: string
}

/** Public half of a keypair, safe to export. */
export type PublicJwk = RsaPublicJwk | EcPublicJwk

/** One entry of the public-key-set document. */
export type PublicKeyDescriptor = PublicJwk & {
  kid: string
  alg: SigningAlgorithm
  use: 'sig'
}

/** The public-key-set document (RFC 7517 JWK Set). */
export interface JsonWebKeySet {
  keys: PublicKeyDescriptor[]
}

/** Protected header carried by every token. */
export interface TokenHeader {
  alg: SigningAlgorithm
  kid: string
  typ: 'JWT'
}

/**
 * Token claim payload.
 */
export interface TokenClaims {
  /** Subject identity */
  sub: string
  /** Issued-at (Unix timestamp, seconds) */
  iat: number
  /** Expiration (Unix timestamp, seconds) */
  exp: number
}

/** Classified outcome of validating a well-formed token. */
export type Verdict =
  | 'valid'
  | 'signature-mismatch'
  | 'token-expired'
  | 'key-expired-at-issuance'
  | 'unknown-key'

/** Result of {@link TokenService.validate}. */
export interface ValidationResult {
  verdict: Verdict
  /** The `kid` the token claims to be signed with. */
  keyId: string
  /** Subject, present only when the signature verified. */
  subject?: string | undefined
  /** Verified claims, present only when the signature verified. */
  claims?: TokenClaims | undefined
}

/** Parameters for issuing a token. */
export interface IssueRequest {
  subject: string
  /** Token lifetime in milliseconds. Defaults to the service default. */
  ttlMs?: number | undefined
  /** Sign with an already-expired key, for negative-path testing. */
  forceExpiredKey?: boolean | undefined
}

/** Result of issuing a token. */
export interface IssueResult {
  /** Compact-serialized token */
  token: string
  /** Identifier of the key that signed it */
  keyId: string
  claims: TokenClaims
}

/** Key lifecycle settings. */
export interface KeysConfig {
  algorithm: SigningAlgorithm
  /** RSA modulus length in bits; ignored for EC keys. */
  modulusLength: number
  /** Lifetime of generated signing keys. */
  validForMinutes: number
  /** Offset used when back-dating deliberately expired keys. */
  expiredSkewSeconds: number
}

/** Token issuance settings. */
export interface TokensConfig {
  ttlMinutes: number
  /** Subject used when a caller does not name one. */
  subject: string
}

/** HTTP listener settings. */
export interface ServerConfig {
  host: string
  port: number
}

/** Top-level keymint configuration. */
export interface KeymintConfig {
  version: 1
  keys: KeysConfig
  tokens: TokensConfig
  server: ServerConfig
}
