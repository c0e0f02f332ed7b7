#!/usr/bin/env node
/**
 * CLI entry point for keymint.
 *
 * Each subcommand is loaded with a dynamic import() so only the requested
 * command's module and its dependencies are loaded.
 *
 * argv layout: [node, script, subcommand, ...commandArgs]
 *
 * @internal
 */

import { parseArgs } from 'node:util'

const { positionals } = parseArgs({
  allowPositionals: true,
  strict: false,
})

const subcommand = positionals[0]
const commandArgs = process.argv.slice(3)

function printHelp(): void {
  process.stdout.write(
    'Usage: keymint <command> [options]\n\n' +
      'Commands:\n' +
      '  serve    Run the HTTP token service\n' +
      '  issue    Print a signed token and the public key set\n' +
      '  config   Manage configuration\n',
  )
}

async function main(): Promise<number> {
  if (subcommand === undefined || subcommand === '--help' || subcommand === '-h') {
    printHelp()
    return 0
  }

  switch (subcommand) {
    case 'serve': {
      const { serveCommand } = await import('./commands/serve.js')
      return serveCommand(commandArgs)
    }
    case 'issue': {
      const { issueCommand } = await import('./commands/issue.js')
      return issueCommand(commandArgs)
    }
    case 'config': {
      const { configCommand } = await import('./commands/config.js')
      return configCommand(commandArgs)
    }
    default:
      process.stderr.write(`Unknown command: ${subcommand}\n`)
      printHelp()
      return 1
  }
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`)
    process.exitCode = 1
  })
