/**
 * Subcommand dispatch for the `sigtrack` executable.
 *
 * Each subcommand is lazy-loaded via dynamic import() so that only the
 * requested command's module is evaluated.
 *
 * @internal
 */

import type { CommandDeps } from './types.js'

export function printHelp(): void {
  process.stdout.write(
    'Usage: sigtrack <command> [options]\n\n' +
      'Commands:\n' +
      '  check    Verify (and with --add/--freshen/--update, record) the signing\n' +
      '           originator of the given paths, or of every tracked path\n' +
      '  list     Show tracked paths and their expected originators\n' +
      '  doctor   Run preflight checks\n',
  )
}

/**
 * Run one CLI invocation.
 *
 * @param argv - Arguments after the executable name: `[subcommand, ...commandArgs]`.
 * @returns The process exit code.
 */
export async function main(argv: string[], deps?: CommandDeps): Promise<number> {
  const [subcommand, ...commandArgs] = argv

  if (subcommand === undefined || subcommand === '--help' || subcommand === '-h') {
    printHelp()
    return 0
  }

  switch (subcommand) {
    case 'check': {
      const { checkCommand } = await import('./commands/check.js')
      return checkCommand(commandArgs, deps)
    }
    case 'list': {
      const { listCommand } = await import('./commands/list.js')
      return listCommand(commandArgs, deps)
    }
    case 'doctor': {
      const { doctorCommand } = await import('./commands/doctor.js')
      return doctorCommand(commandArgs)
    }
    default:
      process.stderr.write(`Unknown command: ${subcommand}\n`)
      printHelp()
      return 1
  }
}
