/**
 * Formatted output helpers for CLI display.
 *
 * @internal
 */

import type { LogSink } from 'sigtrack'

/** Check if a stream is a TTY at call time (not module load time). */
function isTTY(stream: NodeJS.WriteStream = process.stdout): boolean {
  return stream.isTTY ?? false
}

/** Wrap text in ANSI bold if stdout is a TTY. */
export function bold(text: string): string {
  return isTTY() ? `\x1b[1m${text}\x1b[22m` : text
}

/** Wrap text in ANSI dim if stdout is a TTY. */
export function dim(text: string): string {
  return isTTY() ? `\x1b[2m${text}\x1b[22m` : text
}

/** Format an error for display on stderr. */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`
  }
  return String(err)
}

/**
 * Log sink writing one line per message to stderr. Warnings and errors are
 * prefixed; debug lines are dimmed on a terminal.
 */
export const stderrSink: LogSink = (level, message) => {
  switch (level) {
    case 'debug':
      process.stderr.write(
        `${isTTY(process.stderr) ? `\x1b[2m${message}\x1b[22m` : message}\n`,
      )
      break
    case 'info':
      process.stderr.write(`${message}\n`)
      break
    case 'warn':
      process.stderr.write(`warning: ${message}\n`)
      break
    case 'error':
      process.stderr.write(`error: ${message}\n`)
      break
  }
}
