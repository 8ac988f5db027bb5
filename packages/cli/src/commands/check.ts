import { parseArgs } from 'node:util'
import { Logger, Reconciler, SpctlAssessor, UsageError } from 'sigtrack'
import type { LogLevel } from 'sigtrack'
import { formatError, stderrSink } from '../output.js'
import { STORE_LOCATION_OPTIONS, openStore } from '../store-location.js'
import type { CheckCommandOptions, CommandDeps, StoreLocationOptions } from '../types.js'

const USAGE =
  'Usage: sigtrack check [--store <path>] [--config-dir <dir>] [--no-home]\n' +
  '                      [-a|--add] [-f|--freshen] [-u|--update] [-v|--verbose] [-q|--quiet]\n' +
  '                      [<path>...]\n'

function logLevelFor(verbosity: CheckCommandOptions['verbosity']): LogLevel {
  if (verbosity > 0) return 'debug'
  if (verbosity < 0) return 'warn'
  return 'info'
}

function parseRawArgs(args: string[]) {
  try {
    return parseArgs({
      args,
      allowPositionals: true,
      options: {
        ...STORE_LOCATION_OPTIONS,
        add: { type: 'boolean', short: 'a' },
        freshen: { type: 'boolean', short: 'f' },
        update: { type: 'boolean', short: 'u' },
        verbose: { type: 'boolean', short: 'v' },
        quiet: { type: 'boolean', short: 'q' },
      },
      strict: true,
    })
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err))
  }
}

/**
 * Parse `sigtrack check` arguments.
 *
 * @throws {UsageError} for unknown flags, or `--add` without target paths.
 */
export function parseCheckArgs(args: string[]): CheckCommandOptions & StoreLocationOptions {
  const { values, positionals } = parseRawArgs(args)

  const update = values.update === true
  const add = update || values.add === true
  const freshen = update || values.freshen === true

  if (add && positionals.length === 0) {
    throw new UsageError('--add requires at least one path')
  }
  if (values.verbose === true && values.quiet === true) {
    throw new UsageError('--verbose and --quiet cannot be combined')
  }

  return {
    targets: positionals,
    add,
    freshen,
    verbosity: values.verbose === true ? 1 : values.quiet === true ? -1 : 0,
    store: values.store,
    configDir: values['config-dir'],
    noHome: values['no-home'],
  }
}

/**
 * Reconcile the given paths (or every tracked path) against the store.
 * Returns 0 when no target failed, 1 otherwise.
 */
export async function checkCommand(args: string[], deps?: CommandDeps): Promise<number> {
  let options: CheckCommandOptions & StoreLocationOptions
  try {
    options = parseCheckArgs(args)
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    process.stderr.write(USAGE)
    return 1
  }

  try {
    const { config, store } = await openStore(options, deps)
    const logger = new Logger({ level: logLevelFor(options.verbosity), sink: stderrSink })
    logger.debug(`Using expectations file ${store.storePath} (${String(store.size)} tracked)`)

    const reconciler = new Reconciler({
      store,
      assessor: deps?.assessor ?? new SpctlAssessor(config.spctlPath),
      logger,
      now: deps?.now,
    })
    const report = await reconciler.reconcile({
      targets: options.targets,
      allowAdd: options.add,
      allowFreshen: options.freshen,
    })
    return report.failed ? 1 : 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
