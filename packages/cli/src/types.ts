import type { Assessor } from 'sigtrack'

/** Options parsed from the `sigtrack check` command line. */
export interface CheckCommandOptions {
  /** Explicit target paths. Empty means every tracked path. */
  targets: string[]
  /** Create records for untracked targets. */
  add: boolean
  /** Overwrite tracked originators that no longer match. */
  freshen: boolean
  /** Verbosity: -1 quiet, 0 normal, 1 verbose. */
  verbosity: -1 | 0 | 1
}

/** Where the expectations file lives and how its keys are spelled. */
export interface StoreLocationOptions {
  /** Explicit expectations file, overriding config. */
  store?: string | undefined
  /** Directory holding config.json. */
  configDir?: string | undefined
  /** Disable home-relative keys for new records. */
  noHome?: boolean | undefined
}

/**
 * Collaborators a command may have replaced, mainly by tests.
 * Anything omitted takes its production default.
 */
export interface CommandDeps {
  /** Assessment collaborator. Defaults to `spctl` from config. */
  assessor?: Assessor | undefined
  /** Home directory for `~` handling. Defaults to `os.homedir()`. */
  homeDir?: string | undefined
  /** Clock for record timestamps. */
  now?: (() => Date) | undefined
}
