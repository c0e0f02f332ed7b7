/** Options parsed from the `keymint serve` command line. */
export interface ServeCommandOptions {
  /** Interface to bind; defaults to `server.host` from config. */
  host?: string | undefined
  /** Port to bind; defaults to `server.port` from config. */
  port?: number | undefined
  /** Directory holding config.json. */
  configDir?: string | undefined
}

/** Options parsed from the `keymint issue` command line. */
export interface IssueCommandOptions {
  subject?: string | undefined
  /** Token lifetime in seconds. */
  ttlSeconds?: number | undefined
  /** Sign with an already-expired key. */
  expired: boolean
  configDir?: string | undefined
}

/** Status and JSON body of an HTTP response. */
export interface HttpResult {
  status: number
  body: Record<string, unknown>
}
