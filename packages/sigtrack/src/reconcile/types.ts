/**
 * Types for the reconciliation engine.
 */

import type { Assessor } from '../assessment/types.js'
import type { Logger } from '../logger.js'
import type { ExpectationStore } from '../store/expectation-store.js'

/**
 * What a reconciliation run is allowed to do.
 * @public
 */
export interface ReconcileOptions {
  /**
   * Paths to reconcile. When empty or omitted every key in the store is
   * reconciled, and keys whose path has disappeared are skipped.
   */
  targets?: readonly string[] | undefined
  /** Create records for targets that are not yet tracked. */
  allowAdd?: boolean | undefined
  /** Overwrite a tracked originator when the observed one no longer matches. */
  allowFreshen?: boolean | undefined
}

/**
 * Dependencies of a {@link Reconciler}.
 * @public
 */
export interface ReconcilerDeps {
  store: ExpectationStore
  assessor: Assessor
  logger?: Logger | undefined
  /** Clock used for `lastUpdated`. Defaults to `() => new Date()`. */
  now?: (() => Date) | undefined
}

/** Why a target failed. */
export type FailureReason = 'untracked' | 'assessment-failed' | 'drift'

interface OutcomeBase {
  /** The target as it was requested (or the store key, for store-wide runs). */
  target: string
  /** Store key the target resolved to. */
  key: string
}

/**
 * Result of reconciling one target.
 * @public
 */
export type TargetOutcome =
  | (OutcomeBase & { kind: 'created'; originator: string; reported: string })
  | (OutcomeBase & { kind: 'unchanged'; originator: string })
  | (OutcomeBase & {
      kind: 'updated'
      previous: string | undefined
      originator: string
      reported: string
    })
  | (OutcomeBase & { kind: 'verified'; originator: string })
  | (OutcomeBase & { kind: 'skipped'; usablePath: string })
  | (OutcomeBase & {
      kind: 'failed'
      reason: FailureReason
      message: string
      diagnostic?: string | undefined
    })

/**
 * Aggregate result of a reconciliation run.
 * @public
 */
export interface ReconcileReport {
  /** One entry per processed target, in processing order. */
  outcomes: TargetOutcome[]
  /** `true` if any target failed. */
  failed: boolean
  /** `true` if any record was created or refreshed (the store was saved). */
  changed: boolean
}
