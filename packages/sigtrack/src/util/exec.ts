/**
 * Spawn wrapper for the external tools sigtrack drives (`spctl`, `sw_vers`).
 *
 * No timeout is applied: a hung child hangs the caller.
 */

import { spawn } from 'node:child_process'

/** Result of a command execution. */
export interface ExecCommandResult {
  stdout: string
  stderr: string
  exitCode: number
}

/**
 * Execute a command and return trimmed stdout.
 * @throws Error if the command exits with a non-zero code.
 */
export async function execCommand(command: string, args: string[]): Promise<string> {
  const result = await execCommandFull(command, args)
  if (result.exitCode !== 0) {
    throw new Error(`${command} failed with exit code ${String(result.exitCode)}: ${result.stderr}`)
  }
  return result.stdout.trim()
}

/**
 * Execute a command and return its full result, whatever the exit code.
 * Rejects only when the command cannot be started.
 */
export function execCommandFull(command: string, args: string[]): Promise<ExecCommandResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] })
    const stdout: Buffer[] = []
    const stderr: Buffer[] = []

    proc.stdout.on('data', (chunk: Buffer) => {
      stdout.push(chunk)
    })

    proc.stderr.on('data', (chunk: Buffer) => {
      stderr.push(chunk)
    })

    proc.on('close', (code) => {
      resolve({
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
        exitCode: code ?? 1,
      })
    })

    proc.on('error', (error) => {
      reject(error)
    })
  })
}
