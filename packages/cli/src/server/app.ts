/**
 * express application exposing token issuance, the public key set and
 * validation.
 *
 * @internal
 */

import express from 'express'
import type { ErrorRequestHandler, Express, Request, RequestHandler, Response } from 'express'
import type { KeyMint } from 'keymint'
import { formatError, logLine } from '../output.js'
import type { HttpResult } from '../types.js'
import {
  handleIssue,
  handleJwks,
  handleValidate,
  methodNotAllowed,
  notFound,
  toErrorResult,
} from './handlers.js'

function send(res: Response, result: HttpResult): void {
  res.status(result.status).json(result.body)
}

function reportFailure(res: Response, err: unknown): void {
  const result = toErrorResult(err)
  if (result.status >= 500) {
    logLine(`request failed: ${formatError(err)}`)
  }
  send(res, result)
}

/** Adapt a handler producing an {@link HttpResult} to express. */
function route(produce: (req: Request) => HttpResult | Promise<HttpResult>): RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => produce(req))
      .then(
        (result) => {
          send(res, result)
        },
        (err: unknown) => {
          reportFailure(res, err)
        },
      )
      .catch(next)
  }
}

/** Log `METHOD path status durationms` once each response is sent. */
function requestLog(): RequestHandler {
  return (req, res, next) => {
    const started = Date.now()
    res.on('finish', () => {
      logLine(`${req.method} ${req.originalUrl} ${String(res.statusCode)} ${String(Date.now() - started)}ms`)
    })
    next()
  }
}

const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  reportFailure(res, err)
}

/**
 * Build the HTTP application around a KeyMint instance.
 */
export function createApp(mint: KeyMint): Express {
  const app = express()
  app.disable('x-powered-by')
  app.use(requestLog())

  const rejectMethod = route(() => methodNotAllowed())

  app
    .route('/auth')
    .post(route((req) => handleIssue(mint, req.query)))
    .all(rejectMethod)

  const jwks = route((req) => handleJwks(mint, req.query))
  app.route('/jwks').get(jwks).all(rejectMethod)
  app.route('/.well-known/jwks.json').get(jwks).all(rejectMethod)

  app
    .route('/validate')
    .post(express.json(), route((req) => handleValidate(mint, req.body)))
    .all(rejectMethod)

  app.use(route(() => notFound()))
  app.use(errorHandler)

  return app
}
