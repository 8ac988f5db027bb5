/**
 * Programmatic entry to the sigtrack command line.
 *
 * @packageDocumentation
 */

export { main, printHelp } from './cli.js'
export { parseCheckArgs, checkCommand } from './commands/check.js'
export { listCommand } from './commands/list.js'
export { doctorCommand } from './commands/doctor.js'
export type { CheckCommandOptions, StoreLocationOptions, CommandDeps } from './types.js'
