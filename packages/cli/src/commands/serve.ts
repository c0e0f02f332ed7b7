import { parseArgs } from 'node:util'
import type { Server } from 'node:http'
import { KeyMint } from 'keymint'
import { createApp } from '../server/app.js'
import { bold, formatError, logLine } from '../output.js'
import type { ServeCommandOptions } from '../types.js'

/** Parse `serve` arguments, throwing on unknown options or a bad port. */
export function parseServeArgs(args: string[]): ServeCommandOptions {
  const { values } = parseArgs({
    args,
    options: {
      host: { type: 'string' },
      port: { type: 'string' },
      'config-dir': { type: 'string' },
    },
    strict: true,
  })

  let port: number | undefined
  if (values.port !== undefined) {
    port = Number(values.port)
    if (!/^\d+$/.test(values.port) || port > 65535) {
      throw new Error(`Invalid port: ${values.port}`)
    }
  }

  return { host: values.host, port, configDir: values['config-dir'] }
}

/** Resolve once the process is asked to stop. */
function shutdownSignal(): Promise<void> {
  return new Promise((resolve) => {
    const stop = (): void => {
      process.off('SIGINT', stop)
      process.off('SIGTERM', stop)
      resolve()
    }
    process.once('SIGINT', stop)
    process.once('SIGTERM', stop)
  })
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err !== undefined) {
        reject(err)
        return
      }
      resolve()
    })
  })
}

/**
 * Run the HTTP service until `until` settles, or until SIGINT/SIGTERM when it
 * is not given. Signal handlers are only installed once the server listens.
 */
export async function serveCommand(args: string[], until?: Promise<void>): Promise<number> {
  let options: ServeCommandOptions
  try {
    options = parseServeArgs(args)
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    process.stderr.write('Usage: keymint serve [--host <host>] [--port <port>] [--config-dir <dir>]\n')
    return 1
  }

  try {
    const mint = await KeyMint.init({ configDir: options.configDir })
    const host = options.host ?? mint.config.server.host
    const port = options.port ?? mint.config.server.port

    const app = createApp(mint)
    const server = await new Promise<Server>((resolve, reject) => {
      const listening = app.listen(port, host, () => {
        resolve(listening)
      })
      listening.once('error', reject)
    })

    process.stdout.write(`${bold('keymint')} listening on http://${host}:${String(port)}\n`)

    await (until ?? shutdownSignal())
    logLine('shutting down')
    await closeServer(server)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
