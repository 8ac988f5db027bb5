import { parseArgs } from 'node:util'
import { inferAssessmentMode, serializeRecords } from 'sigtrack'
import { bold, dim, formatError } from '../output.js'
import { STORE_LOCATION_OPTIONS, openStore } from '../store-location.js'
import type { CommandDeps } from '../types.js'

/**
 * Print every tracked path with its expected originator, without assessing
 * anything. `--json` prints the records exactly as they are persisted.
 */
export async function listCommand(args: string[], deps?: CommandDeps): Promise<number> {
  try {
    const { values } = parseArgs({
      args,
      options: {
        ...STORE_LOCATION_OPTIONS,
        json: { type: 'boolean' },
      },
      strict: true,
    })

    const { store } = await openStore(
      { store: values.store, configDir: values['config-dir'], noHome: values['no-home'] },
      deps,
    )

    if (values.json === true) {
      process.stdout.write(serializeRecords(store))
      return 0
    }

    if (store.size === 0) {
      process.stdout.write(`No paths tracked in ${store.storePath}\n`)
      return 0
    }

    for (const [key, record] of store) {
      const mode =
        record.assessmentType ?? `${inferAssessmentMode(store.resolve(key).usablePath)} (inferred)`
      process.stdout.write(`${bold(key)}\n`)
      process.stdout.write(`  originator:   ${record.originator ?? dim('(not recorded)')}\n`)
      process.stdout.write(`  assessment:   ${mode}\n`)
      process.stdout.write(`  last checked: ${record.lastUpdated ?? dim('never')}\n`)
    }
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
