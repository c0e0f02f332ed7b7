/**
 * HTTP surface and command implementations for keymint.
 *
 * @packageDocumentation
 */

export { createApp } from './server/app.js'
export {
  HttpError,
  handleIssue,
  handleJwks,
  handleValidate,
  methodNotAllowed,
  notFound,
  toErrorResult,
  parseFlag,
  parseSeconds,
  parseInstant,
} from './server/handlers.js'
export { serveCommand, parseServeArgs } from './commands/serve.js'
export { issueCommand, parseIssueArgs } from './commands/issue.js'
export { configCommand } from './commands/config.js'
export type { HttpResult, ServeCommandOptions, IssueCommandOptions } from './types.js'
