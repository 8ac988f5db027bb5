/**
 * Reconciliation: compare the current originator of each target against the
 * expectation recorded in the store, and decide whether to record, confirm,
 * update with a warning, or fail.
 *
 * | tracked | persisting | match | outcome                                  |
 * |---------|------------|-------|------------------------------------------|
 * | no      | yes        | -     | create the record                        |
 * | yes     | yes        | yes   | no change, timestamp refreshed           |
 * | yes     | yes        | no    | warn and overwrite the originator        |
 * | yes     | no         | yes   | verified                                 |
 * | yes     | no         | no    | failure: originator changed              |
 *
 * A target is persisting when it is new (and adding is allowed) or when
 * freshening is allowed.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import { inferAssessmentMode } from '../assessment/mode.js'
import { extractOriginator } from '../assessment/spctl.js'
import type { Assessor } from '../assessment/types.js'
import { TargetNotFoundError } from '../errors.js'
import { silentLogger } from '../logger.js'
import type { Logger } from '../logger.js'
import {
  canonicalizeOriginator,
  formatOriginatorPattern,
  matchesOriginator,
  parseOriginatorPattern,
} from '../originator/pattern.js'
import type { ExpectationStore } from '../store/expectation-store.js'
import type { ExpectationRecord } from '../types.js'
import type {
  ReconcileOptions,
  ReconcileReport,
  ReconcilerDeps,
  TargetOutcome,
} from './types.js'

async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.stat(targetPath)
    return true
  } catch (err) {
    if (
      typeof err === 'object' &&
      err !== null &&
      'code' in err &&
      (err.code === 'ENOENT' || err.code === 'ENOTDIR')
    ) {
      return false
    }
    throw err
  }
}

function describePattern(pattern: string | undefined): string {
  return pattern ?? '(none)'
}

/**
 * Drives reconciliation runs against one store.
 * @public
 */
export class Reconciler {
  readonly #store: ExpectationStore
  readonly #assessor: Assessor
  readonly #logger: Logger
  readonly #now: () => Date

  constructor(deps: ReconcilerDeps) {
    this.#store = deps.store
    this.#assessor = deps.assessor
    this.#logger = deps.logger ?? silentLogger
    this.#now = deps.now ?? (() => new Date())
  }

  /**
   * Reconcile every target in order and save the store once if anything
   * changed. A failing target never stops the remaining ones.
   *
   * @throws {TargetNotFoundError} if an explicitly requested path does not exist.
   * @throws {AssessmentContractError} if a successful assessment reports no originator.
   * @throws {FilesystemError} if the store cannot be saved.
   */
  async reconcile(options?: ReconcileOptions): Promise<ReconcileReport> {
    const explicit = options?.targets !== undefined && options.targets.length > 0
    const targets = explicit ? [...(options?.targets ?? [])] : this.#store.keys()
    const allowAdd = options?.allowAdd ?? false
    const allowFreshen = options?.allowFreshen ?? false

    const outcomes: TargetOutcome[] = []
    let changed = false

    for (const target of targets) {
      const outcome = await this.#reconcileTarget(target, explicit, allowAdd, allowFreshen)
      outcomes.push(outcome)
      this.#report(outcome)
      if (outcome.kind === 'created' || outcome.kind === 'unchanged' || outcome.kind === 'updated') {
        changed = true
      }
    }

    if (changed) {
      this.#logger.debug(`Saving ${this.#store.storePath}`)
      await this.#store.save()
    }

    return {
      outcomes,
      failed: outcomes.some((outcome) => outcome.kind === 'failed'),
      changed,
    }
  }

  async #reconcileTarget(
    target: string,
    explicit: boolean,
    allowAdd: boolean,
    allowFreshen: boolean,
  ): Promise<TargetOutcome> {
    const { usablePath, key, tracked } = this.#store.resolve(target)
    this.#logger.debug(`${target} resolved to key ${key} (${usablePath})`)

    if (!(await pathExists(usablePath))) {
      if (explicit) {
        throw new TargetNotFoundError(`No such file or directory: ${usablePath}`, usablePath)
      }
      return { kind: 'skipped', target, key, usablePath }
    }

    if (!tracked && !allowAdd) {
      return {
        kind: 'failed',
        target,
        key,
        reason: 'untracked',
        message: 'not tracked, and adding is disabled',
      }
    }

    const existing: ExpectationRecord | undefined = tracked ? this.#store.get(key) : undefined
    const willPersist = !tracked || allowFreshen
    const mode = existing?.assessmentType ?? inferAssessmentMode(usablePath)

    const result = await this.#assessor.assess(usablePath, mode)
    if (result.status !== 0) {
      return {
        kind: 'failed',
        target,
        key,
        reason: 'assessment-failed',
        message: `Assessment of ${usablePath} failed with status ${String(result.status)}`,
        diagnostic: result.diagnostic,
      }
    }

    const reported = extractOriginator(result, usablePath)
    const stored = existing?.originator
    const matches = stored !== undefined && matchesOriginator(parseOriginatorPattern(stored), reported)

    if (!willPersist) {
      if (matches) {
        return { kind: 'verified', target, key, originator: stored }
      }
      return {
        kind: 'failed',
        target,
        key,
        reason: 'drift',
        message: `Originator changed from ${describePattern(stored)} to ${reported}`,
      }
    }

    const originator = matches ? stored : formatOriginatorPattern(canonicalizeOriginator(reported))
    this.#store.set(key, { ...existing, originator, lastUpdated: this.#now().toISOString() })

    if (existing === undefined) {
      return { kind: 'created', target, key, originator, reported }
    }
    if (matches) {
      return { kind: 'unchanged', target, key, originator }
    }
    return { kind: 'updated', target, key, previous: stored, originator, reported }
  }

  #report(outcome: TargetOutcome): void {
    switch (outcome.kind) {
      case 'created':
        this.#logger.info(`Created ${outcome.key}: ${outcome.originator}`)
        break
      case 'unchanged':
        this.#logger.info(`No change ${outcome.key}`)
        break
      case 'updated':
        this.#logger.warn(
          `${outcome.key}: Originator changing from ${describePattern(outcome.previous)} to ${outcome.originator}`,
        )
        break
      case 'verified':
        this.#logger.info(`Verified ${outcome.key} (originator ${outcome.originator})`)
        break
      case 'skipped':
        this.#logger.debug(`Skipping ${outcome.key}: ${outcome.usablePath} no longer exists`)
        break
      case 'failed':
        this.#logger.error(`${outcome.key}: ${outcome.message}`)
        if (outcome.diagnostic !== undefined && outcome.diagnostic !== '') {
          this.#logger.error(outcome.diagnostic)
        }
        break
    }
  }
}
