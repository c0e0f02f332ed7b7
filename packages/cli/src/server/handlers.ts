/**
 * Request handling for the HTTP surface, kept free of express types so each
 * route can be exercised directly.
 *
 * @internal
 */

import {
  KeyGenerationError,
  MalformedTokenError,
  NoValidKeyError,
} from 'keymint'
import type { IssueOptions, KeyMint } from 'keymint'
import type { HttpResult } from '../types.js'

/** An error carrying the HTTP status it should be reported with. */
export class HttpError extends Error {
  readonly status: number

  constructor(message: string, status: number) {
    super(message)
    this.name = 'HttpError'
    this.status = status
  }
}

/**
 * Type guard for plain objects.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Read a single string query parameter; repeated parameters are rejected. */
function queryString(query: unknown, name: string): string | undefined {
  if (!isObject(query)) {
    return undefined
  }
  const value = query[name]
  if (value === undefined) {
    return undefined
  }
  if (typeof value !== 'string') {
    throw new HttpError(`Query parameter '${name}' must be given once`, 400)
  }
  return value
}

/** Parse a boolean query flag. Absent means `false`. */
export function parseFlag(query: unknown, name: string): boolean {
  const value = queryString(query, name)
  switch (value?.toLowerCase()) {
    case undefined:
    case 'false':
    case '0':
      return false
    case 'true':
    case '1':
    case '':
      return true
    default:
      throw new HttpError(`Query parameter '${name}' must be true or false`, 400)
  }
}

/** Parse a non-negative whole number of seconds into milliseconds. */
export function parseSeconds(query: unknown, name: string): number | undefined {
  const value = queryString(query, name)
  if (value === undefined) {
    return undefined
  }
  if (!/^\d+$/.test(value)) {
    throw new HttpError(`Query parameter '${name}' must be a whole number of seconds`, 400)
  }
  return Number(value) * 1000
}

/** Parse an instant given as epoch seconds or an ISO-8601 string. */
export function parseInstant(query: unknown, name: string): Date | undefined {
  const value = queryString(query, name)
  if (value === undefined) {
    return undefined
  }
  const ms = /^\d+$/.test(value) ? Number(value) * 1000 : Date.parse(value)
  if (Number.isNaN(ms)) {
    throw new HttpError(
      `Query parameter '${name}' must be epoch seconds or an ISO-8601 timestamp`,
      400,
    )
  }
  return new Date(ms)
}

/** `POST /auth` */
export async function handleIssue(mint: KeyMint, query: unknown): Promise<HttpResult> {
  const options: IssueOptions = {
    subject: queryString(query, 'subject'),
    ttlMs: parseSeconds(query, 'ttl'),
    expired: parseFlag(query, 'expired'),
  }
  if (options.subject === '') {
    throw new HttpError("Query parameter 'subject' must not be empty", 400)
  }

  const { token, keyId } = await mint.issue(options)
  return { status: 200, body: { token, kid: keyId } }
}

/** `GET /jwks` */
export function handleJwks(mint: KeyMint, query: unknown): HttpResult {
  const at = parseInstant(query, 'at')
  return { status: 200, body: { keys: mint.jwks(at).keys } }
}

/** `POST /validate` */
export async function handleValidate(mint: KeyMint, body: unknown): Promise<HttpResult> {
  if (!isObject(body) || typeof body.token !== 'string') {
    throw new HttpError("Request body must be a JSON object with a string 'token'", 400)
  }

  const result = await mint.validate(body.token)
  const payload: Record<string, unknown> = { verdict: result.verdict, kid: result.keyId }
  if (result.subject !== undefined) {
    payload.sub = result.subject
  }
  return { status: 200, body: payload }
}

/** Response for a known path requested with the wrong method. */
export function methodNotAllowed(): HttpResult {
  return { status: 405, body: { detail: 'Method Not Allowed' } }
}

/** Response for an unknown path. */
export function notFound(): HttpResult {
  return { status: 404, body: { detail: 'Not Found' } }
}

/** Map a thrown value to the response reporting it. */
export function toErrorResult(err: unknown): HttpResult {
  if (err instanceof HttpError) {
    return { status: err.status, body: { detail: err.message } }
  }
  if (err instanceof MalformedTokenError || err instanceof RangeError) {
    return { status: 400, body: { detail: err.message } }
  }
  if (err instanceof NoValidKeyError || err instanceof KeyGenerationError) {
    return { status: 500, body: { detail: err.message } }
  }
  // body-parser reports unreadable request bodies with a 4xx `status`.
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
    return { status: err.status, body: { detail: 'Invalid request body' } }
  }
  return { status: 500, body: { detail: 'Internal Server Error' } }
}
