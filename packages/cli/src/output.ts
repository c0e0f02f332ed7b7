/**
 * Formatted output helpers for CLI display.
 *
 * @internal
 */

/** Check if a stream is a TTY at call time (not module load time). */
function isTTY(stream: NodeJS.WriteStream = process.stdout): boolean {
  return stream.isTTY ?? false
}

/** Wrap text in ANSI bold if stdout is a TTY. */
export function bold(text: string): string {
  return isTTY() ? `\x1b[1m${text}\x1b[22m` : text
}

/** Wrap text in ANSI dim if stderr is a TTY. */
export function dim(text: string): string {
  return isTTY(process.stderr) ? `\x1b[2m${text}\x1b[22m` : text
}

/** Format an error for display on stderr. */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`
  }
  return String(err)
}

/** Write one timestamped diagnostic line to stderr. */
export function logLine(message: string, now: Date = new Date()): void {
  process.stderr.write(`${dim(now.toISOString())} ${message}\n`)
}
