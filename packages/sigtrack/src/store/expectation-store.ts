/**
 * Expectations store — load, save, and resolve the recorded originator of
 * every tracked path.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { FilesystemError, StoreFormatError } from '../errors.js'
import { parseOriginatorPattern } from '../originator/pattern.js'
import { isAssessmentMode } from '../types.js'
import type { ExpectationRecord } from '../types.js'
import { expandHome, normalizePath, toHomeRelative } from './paths.js'

/** Raw shape of one record persisted to disk. */
interface RawRecord {
  assessment_type?: string
  last_updated?: string
  originator?: string
}

const RAW_FIELDS: ReadonlySet<string> = new Set(['originator', 'assessment_type', 'last_updated'])

/**
 * Options accepted by {@link ExpectationStore.load}.
 * @public
 */
export interface ExpectationStoreOptions {
  /**
   * Propose home-relative keys (`~/...`) for paths under the home directory.
   * Defaults to `true`.
   */
  substituteHome?: boolean | undefined
  /** Home directory used for `~` expansion. Defaults to `os.homedir()`. */
  homeDir?: string | undefined
}

/**
 * Result of {@link ExpectationStore.resolve}.
 * @public
 */
export interface ResolvedTarget {
  /** Filesystem path to check and assess (normalized, `~` expanded). */
  usablePath: string
  /** Existing store key for the target, or the key proposed for a new record. */
  key: string
  /** Whether `key` is already present in the store. */
  tracked: boolean
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isErrnoCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code
}

/**
 * Validate one persisted record.
 *
 * @throws {StoreFormatError} naming `key` when any field is malformed.
 */
function parseRecord(storePath: string, key: string, value: unknown): ExpectationRecord {
  if (!isObject(value)) {
    throw new StoreFormatError(`Record for ${key} must be an object`, storePath, key)
  }
  for (const field of Object.keys(value)) {
    if (!RAW_FIELDS.has(field)) {
      throw new StoreFormatError(`Record for ${key} has unknown field "${field}"`, storePath, key)
    }
  }

  const record: ExpectationRecord = {}

  const { originator, assessment_type: assessmentType, last_updated: lastUpdated } = value
  if (originator !== undefined) {
    if (typeof originator !== 'string') {
      throw new StoreFormatError(`Record for ${key}: originator must be a string`, storePath, key)
    }
    try {
      parseOriginatorPattern(originator)
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err)
      throw new StoreFormatError(
        `Record for ${key}: originator is not a valid pattern (${detail})`,
        storePath,
        key,
      )
    }
    record.originator = originator
  }
  if (assessmentType !== undefined) {
    if (!isAssessmentMode(assessmentType)) {
      throw new StoreFormatError(
        `Record for ${key}: assessment_type must be "open" or "execute"`,
        storePath,
        key,
      )
    }
    record.assessmentType = assessmentType
  }
  if (lastUpdated !== undefined) {
    if (typeof lastUpdated !== 'string') {
      throw new StoreFormatError(`Record for ${key}: last_updated must be a string`, storePath, key)
    }
    record.lastUpdated = lastUpdated
  }
  return record
}

function toRawRecord(record: ExpectationRecord): RawRecord {
  const raw: RawRecord = {}
  if (record.assessmentType !== undefined) raw.assessment_type = record.assessmentType
  if (record.lastUpdated !== undefined) raw.last_updated = record.lastUpdated
  if (record.originator !== undefined) raw.originator = record.originator
  return raw
}

/**
 * Serialize records deterministically: keys sorted, two-space indentation,
 * trailing newline. Record fields are emitted in sorted order as well.
 *
 * The document is assembled entry by entry so that neither integer-like keys
 * nor `__proto__` go through a plain object, which would reorder or drop them.
 */
export function serializeRecords(records: Iterable<[string, ExpectationRecord]>): string {
  const sorted = [...records].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  if (sorted.length === 0) {
    return '{}\n'
  }
  const entries = sorted.map(([key, record]) => {
    const body = JSON.stringify(toRawRecord(record), null, 2).replace(/\n/g, '\n  ')
    return `  ${JSON.stringify(key)}: ${body}`
  })
  return `{\n${entries.join(',\n')}\n}\n`
}

/**
 * Ordered mapping from store key to {@link ExpectationRecord}, backed by a
 * JSON file.
 *
 * @public
 */
export class ExpectationStore implements Iterable<[string, ExpectationRecord]> {
  /** Location of the backing file. */
  readonly storePath: string
  /** Whether new keys are proposed in home-relative form. */
  readonly substituteHome: boolean
  /** Home directory used for `~` expansion and substitution. */
  readonly homeDir: string

  readonly #records: Map<string, ExpectationRecord>

  constructor(
    storePath: string,
    records?: Iterable<[string, ExpectationRecord]>,
    options?: ExpectationStoreOptions,
  ) {
    this.storePath = storePath
    this.substituteHome = options?.substituteHome ?? true
    this.homeDir = normalizePath(options?.homeDir ?? os.homedir())
    this.#records = new Map(records)
  }

  /**
   * Load the store at `storePath`. A missing file yields an empty store.
   *
   * @throws {StoreFormatError} if the file is not valid JSON or any record is malformed.
   * @throws {FilesystemError} if the file exists but cannot be read.
   */
  static async load(storePath: string, options?: ExpectationStoreOptions): Promise<ExpectationStore> {
    let rawText: string
    try {
      rawText = await fs.readFile(storePath, 'utf8')
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) {
        return new ExpectationStore(storePath, [], options)
      }
      const detail = err instanceof Error ? err.message : String(err)
      throw new FilesystemError(
        `Cannot read expectations file ${storePath}: ${detail}`,
        storePath,
        'read',
      )
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(rawText)
    } catch {
      throw new StoreFormatError(`Expectations file is not valid JSON: ${storePath}`, storePath)
    }
    if (!isObject(parsed)) {
      throw new StoreFormatError(`Expectations file must contain a JSON object: ${storePath}`, storePath)
    }

    const records: [string, ExpectationRecord][] = Object.entries(parsed).map(([key, value]) => [
      key,
      parseRecord(storePath, key, value),
    ])
    return new ExpectationStore(storePath, records, options)
  }

  /** Number of tracked paths. */
  get size(): number {
    return this.#records.size
  }

  get(key: string): ExpectationRecord | undefined {
    return this.#records.get(key)
  }

  has(key: string): boolean {
    return this.#records.has(key)
  }

  set(key: string, record: ExpectationRecord): void {
    this.#records.set(key, record)
  }

  delete(key: string): boolean {
    return this.#records.delete(key)
  }

  keys(): string[] {
    return [...this.#records.keys()]
  }

  entries(): [string, ExpectationRecord][] {
    return [...this.#records.entries()]
  }

  [Symbol.iterator](): Iterator<[string, ExpectationRecord]> {
    return this.#records.entries()
  }

  /**
   * Map an arbitrary spelling of a target path to its store key.
   *
   * Candidates are tried in order: the path as given, its normalized form,
   * the `~`-expanded form and, when home substitution is on, the
   * home-relative form. The first one already in the store wins. Otherwise
   * the home-relative form (or the normalized form, without substitution)
   * is proposed as the key of a new record.
   */
  resolve(target: string): ResolvedTarget {
    const normalized = normalizePath(target)
    const expanded = expandHome(normalized, this.homeDir)
    const candidates = [target, normalized, expanded]

    let proposed = normalized
    if (this.substituteHome) {
      const homeRelative = toHomeRelative(normalized, this.homeDir)
      if (homeRelative !== normalized) {
        candidates.push(homeRelative)
        proposed = homeRelative
      }
    }

    for (const candidate of candidates) {
      if (this.#records.has(candidate)) {
        return { usablePath: expanded, key: candidate, tracked: true }
      }
    }
    return { usablePath: expanded, key: proposed, tracked: false }
  }

  /**
   * Write every record to {@link storePath}, replacing the previous file
   * atomically through a sibling temporary file.
   *
   * @throws {FilesystemError} if the directory or file cannot be written.
   */
  async save(): Promise<void> {
    const dir = path.dirname(this.storePath)
    const tmpPath = path.join(dir, `.${path.basename(this.storePath)}.${String(process.pid)}.tmp`)
    try {
      await fs.mkdir(dir, { recursive: true })
    } catch (err) {
      throw this.#writeError(err)
    }
    try {
      await fs.writeFile(tmpPath, serializeRecords(this.#records), 'utf8')
      await fs.rename(tmpPath, this.storePath)
    } catch (err) {
      await fs.rm(tmpPath, { force: true })
      throw this.#writeError(err)
    }
  }

  #writeError(err: unknown): FilesystemError {
    const detail = err instanceof Error ? err.message : String(err)
    return new FilesystemError(
      `Cannot write expectations file ${this.storePath}: ${detail}`,
      this.storePath,
      'write',
    )
  }
}
