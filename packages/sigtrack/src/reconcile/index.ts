/**
 * Reconciliation engine barrel export.
 */

export type {
  ReconcileOptions,
  ReconcilerDeps,
  FailureReason,
  TargetOutcome,
  ReconcileReport,
} from './types.js'

export { Reconciler } from './reconciler.js'
