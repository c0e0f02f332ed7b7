/**
 * Error hierarchy for keymint.
 *
 * Validation verdicts are not errors: an invalid but well-formed token is
 * reported through {@link ValidationResult}, never thrown.
 *
 * @packageDocumentation
 */

/** Base error for all keymint errors. */
export class KeymintError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'KeymintError'
  }
}

// --- Key Lifecycle Failures ---

/**
 * Thrown when the crypto primitive cannot produce a keypair. This indicates a
 * broken environment and is never retried.
 */
export class KeyGenerationError extends KeymintError {
  /** The signing algorithm the keypair was requested for. */
  readonly algorithm: string

  constructor(message: string, algorithm: string) {
    super(message)
    this.name = 'KeyGenerationError'
    this.algorithm = algorithm
  }
}

/**
 * Thrown when an exact key lookup misses.
 */
export class KeyNotFoundError extends KeymintError {
  /** The identifier that was looked up. */
  readonly keyId: string

  constructor(message: string, keyId: string) {
    super(message)
    this.name = 'KeyNotFoundError'
    this.keyId = keyId
  }
}

/**
 * Thrown when a token must be signed but no key in the store is currently
 * valid. Hosting layers should report this as a server-side failure.
 */
export class NoValidKeyError extends KeymintError {
  constructor(message: string) {
    super(message)
    this.name = 'NoValidKeyError'
  }
}

// --- Token Encoding Failures ---

/**
 * Thrown when a token cannot be parsed: wrong segment count, bad base64url,
 * bad JSON, or missing and mistyped header or claim fields.
 */
export class MalformedTokenError extends KeymintError {
  /** Short machine-readable cause, e.g. `'segments'` or `'header'`. */
  readonly reason: string

  constructor(message: string, reason: string) {
    super(message)
    this.name = 'MalformedTokenError'
    this.reason = reason
  }
}
