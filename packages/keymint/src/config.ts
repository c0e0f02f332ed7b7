/**
 * Configuration loading, validation, and defaults for keymint.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import * as os from 'node:os'
import type { KeymintConfig, SigningAlgorithm } from './types.js'

const ALGORITHMS: readonly SigningAlgorithm[] = ['RS256', 'PS256', 'ES256']

/** Return the platform-appropriate default config directory. */
export function getDefaultConfigDir(): string {
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA
    if (appData !== undefined) {
      return path.join(appData, 'keymint')
    }
    return path.join(os.homedir(), 'AppData', 'Roaming', 'keymint')
  }
  return path.join(os.homedir(), '.config', 'keymint')
}

/** Default configuration when no config file exists. */
export function defaultConfig(): KeymintConfig {
  return {
    version: 1,
    keys: {
      algorithm: 'RS256',
      modulusLength: 2048,
      validForMinutes: 60,
      expiredSkewSeconds: 60,
    },
    tokens: { ttlMinutes: 10, subject: 'test-user' },
    server: { host: '127.0.0.1', port: 8000 },
  }
}

/**
 * Type guard for plain objects.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isAlgorithm(value: unknown): value is SigningAlgorithm {
  return ALGORITHMS.some((alg) => alg === value)
}

function requirePositive(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new Error(`Config ${field} must be a positive number`)
  }
  return value
}

/**
 * Validate an unknown value as a KeymintConfig, throwing on invalid structure.
 */
export function validateConfig(config: unknown): KeymintConfig {
  if (!isObject(config)) {
    throw new Error('Config must be an object')
  }

  if (typeof config.version !== 'number' || config.version !== 1) {
    throw new Error('Config version must be 1')
  }

  const { keys, tokens, server } = config

  if (!isObject(keys)) {
    throw new Error('Config keys must be an object')
  }
  if (!isAlgorithm(keys.algorithm)) {
    throw new Error(`Config keys.algorithm must be one of ${ALGORITHMS.join(', ')}`)
  }
  const modulusLength = requirePositive(keys.modulusLength, 'keys.modulusLength')
  if (!Number.isInteger(modulusLength) || modulusLength < 2048) {
    throw new Error('Config keys.modulusLength must be an integer of at least 2048')
  }
  const validForMinutes = requirePositive(keys.validForMinutes, 'keys.validForMinutes')
  const expiredSkewSeconds = requirePositive(keys.expiredSkewSeconds, 'keys.expiredSkewSeconds')

  if (!isObject(tokens)) {
    throw new Error('Config tokens must be an object')
  }
  const ttlMinutes = requirePositive(tokens.ttlMinutes, 'tokens.ttlMinutes')
  if (typeof tokens.subject !== 'string' || tokens.subject.trim() === '') {
    throw new Error('Config tokens.subject must be a non-empty string')
  }

  if (!isObject(server)) {
    throw new Error('Config server must be an object')
  }
  if (typeof server.host !== 'string' || server.host.trim() === '') {
    throw new Error('Config server.host must be a non-empty string')
  }
  const port = server.port
  if (typeof port !== 'number' || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error('Config server.port must be an integer between 0 and 65535')
  }

  return {
    version: 1,
    keys: {
      algorithm: keys.algorithm,
      modulusLength,
      validForMinutes,
      expiredSkewSeconds,
    },
    tokens: { ttlMinutes, subject: tokens.subject },
    server: { host: server.host, port },
  }
}

/**
 * Load the keymint config from disk, falling back to defaults if the file
 * does not exist.
 *
 * @param configDir - Directory containing config.json. Defaults to platform-appropriate path.
 */
export async function loadConfig(configDir?: string): Promise<KeymintConfig> {
  const dir = configDir ?? getDefaultConfigDir()
  const configPath = path.join(dir, 'config.json')

  let raw: string
  try {
    raw = await fs.readFile(configPath, 'utf-8')
  } catch {
    return defaultConfig()
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new Error(`Failed to parse config file at ${configPath}`)
  }

  return validateConfig(parsed)
}
