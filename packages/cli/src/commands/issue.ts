import { parseArgs } from 'node:util'
import { KeyMint } from 'keymint'
import { formatError } from '../output.js'
import type { IssueCommandOptions } from '../types.js'

/** Parse `issue` arguments, throwing on unknown options or a bad TTL. */
export function parseIssueArgs(args: string[]): IssueCommandOptions {
  const { values } = parseArgs({
    args,
    options: {
      subject: { type: 'string' },
      ttl: { type: 'string' },
      expired: { type: 'boolean', default: false },
      'config-dir': { type: 'string' },
    },
    strict: true,
  })

  let ttlSeconds: number | undefined
  if (values.ttl !== undefined) {
    if (!/^\d+$/.test(values.ttl)) {
      throw new Error(`Invalid ttl: ${values.ttl}`)
    }
    ttlSeconds = Number(values.ttl)
  }

  return {
    subject: values.subject,
    ttlSeconds,
    expired: values.expired,
    configDir: values['config-dir'],
  }
}

/**
 * Mint a token in a throwaway store and print it together with the public
 * key set, so it can be verified offline.
 */
export async function issueCommand(args: string[]): Promise<number> {
  let options: IssueCommandOptions
  try {
    options = parseIssueArgs(args)
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    process.stderr.write(
      'Usage: keymint issue [--subject <sub>] [--ttl <seconds>] [--expired] [--config-dir <dir>]\n',
    )
    return 1
  }

  try {
    const mint = await KeyMint.init({ configDir: options.configDir })
    const { token, keyId } = await mint.issue({
      subject: options.subject,
      ttlMs: options.ttlSeconds === undefined ? undefined : options.ttlSeconds * 1000,
      expired: options.expired,
    })
    const output = { token, kid: keyId, jwks: mint.jwks() }
    process.stdout.write(`${JSON.stringify(output, null, 2)}\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
