/**
 * Shared types and interfaces for sigtrack.
 */

/**
 * Usage context presented to the assessment authority. `open` is used for
 * bundles that are loaded by another process (preference panes, plug-ins,
 * installers); `execute` for everything else.
 */
export type AssessmentMode = 'open' | 'execute'

/** Every {@link AssessmentMode}, in display order. */
export const ASSESSMENT_MODES: readonly AssessmentMode[] = ['open', 'execute']

/** Narrow an unknown value to an {@link AssessmentMode}. */
export function isAssessmentMode(value: unknown): value is AssessmentMode {
  return value === 'open' || value === 'execute'
}

/**
 * The expected signing identity of one tracked path.
 *
 * Every field is optional: a record that has been added by hand to the
 * expectations file may carry nothing but an assessment-mode override.
 */
export interface ExpectationRecord {
  /**
   * Stored originator pattern, either `id:<TEAMID>` or an anchored regular
   * expression. Absent until the first successful assessment is recorded.
   */
  originator?: string | undefined
  /** Assessment mode override. Inferred from the path when absent. */
  assessmentType?: AssessmentMode | undefined
  /** ISO-8601 timestamp of the last reconciliation that persisted this record. */
  lastUpdated?: string | undefined
}

/** Status of a preflight check. */
export type PreflightCheckStatus = 'ok' | 'missing' | 'disabled' | 'unsupported'

/** Result of a preflight check for a single dependency. */
export interface PreflightCheck {
  /** Human-readable name of the dependency being checked. */
  name: string
  /** Whether the dependency was found and usable. */
  status: PreflightCheckStatus
  /** Detail reported by the dependency itself, when available. */
  version?: string | undefined
  /** Human-readable explanation of why the status is not `'ok'`. */
  reason?: string | undefined
}

/** Aggregated result from all preflight checks. */
export interface PreflightResult {
  /** Individual check results, one per dependency inspected. */
  checks: PreflightCheck[]
  /** `true` if all required checks passed and the system is ready. */
  ready: boolean
  /** Non-fatal advisory messages. */
  warnings: string[]
  /** Action items the user should complete before sigtrack will work. */
  nextSteps: string[]
}

/** Contents of `config.json`. */
export interface SigtrackConfig {
  version: 1
  /** Location of the expectations file. Relative paths and `~` are allowed. */
  storePath?: string | undefined
  /** Whether new store keys are written relative to the home directory. */
  substituteHome: boolean
  /** The `spctl` executable to invoke. */
  spctlPath: string
}
