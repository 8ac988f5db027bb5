/**
 * Error hierarchy for sigtrack.
 *
 * Only conditions that abort a whole run are modelled as errors. A target
 * whose signature drifted, or whose assessment failed, is reported as a
 * {@link TargetOutcome} instead.
 *
 * @packageDocumentation
 */

/** Base error for all sigtrack errors. */
export class SigtrackError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SigtrackError'
  }
}

/**
 * Thrown when command-line options are combined in a way that cannot be
 * executed (e.g. `--add` without any target paths).
 */
export class UsageError extends SigtrackError {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

/**
 * Thrown when the user explicitly named a target path that does not exist.
 * Aborts the run immediately; remaining targets are not processed.
 */
export class TargetNotFoundError extends SigtrackError {
  /** The path as it was checked on disk (home marker expanded). */
  readonly path: string

  constructor(message: string, targetPath: string) {
    super(message)
    this.name = 'TargetNotFoundError'
    this.path = targetPath
  }
}

/**
 * Thrown when the assessment collaborator reports success but its structured
 * output is unusable (unparseable, or missing the originator entry).
 */
export class AssessmentContractError extends SigtrackError {
  /** The path whose assessment broke the contract. */
  readonly path: string

  constructor(message: string, targetPath: string) {
    super(message)
    this.name = 'AssessmentContractError'
    this.path = targetPath
  }
}

/**
 * Thrown when the persisted expectations file cannot be parsed or contains a
 * malformed record. There is no partial recovery.
 */
export class StoreFormatError extends SigtrackError {
  /** Location of the expectations file. */
  readonly storePath: string

  /** The offending store key, when the problem is a single record. */
  readonly key: string | undefined

  constructor(message: string, storePath: string, key?: string) {
    super(message)
    this.name = 'StoreFormatError'
    this.storePath = storePath
    this.key = key
  }
}

/**
 * Thrown when a filesystem operation fails due to a permission or access
 * problem (e.g. the store directory is not writable).
 */
export class FilesystemError extends SigtrackError {
  /**
   * The absolute path of the file or directory that caused the error.
   */
  readonly path: string

  /**
   * The permission level that was required but not available
   * (e.g. `'read'`, `'write'`).
   */
  readonly permission: string

  constructor(message: string, filePath: string, permission: string) {
    super(message)
    this.name = 'FilesystemError'
    this.path = filePath
    this.permission = permission
  }
}

/** Thrown when `config.json` exists but is not valid. */
export class ConfigError extends SigtrackError {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}
