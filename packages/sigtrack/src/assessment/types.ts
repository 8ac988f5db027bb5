/**
 * Types for the assessment collaborator.
 */

import type { AssessmentMode } from '../types.js'

export type { AssessmentMode }

/**
 * Outcome of one assessment request.
 * @public
 */
export interface AssessmentResult {
  /** Exit status of the assessment authority. Zero means the path was accepted. */
  status: number
  /**
   * String-valued entries of the structured assessment, keyed as the authority
   * reports them (e.g. `assessment:originator`). Absent on a non-zero status.
   */
  output?: Readonly<Record<string, string>> | undefined
  /** Human-readable diagnostic text (the authority's stderr). */
  diagnostic: string
}

/**
 * Anything that can assess the signature of a path.
 * @public
 */
export interface Assessor {
  assess(targetPath: string, mode: AssessmentMode): Promise<AssessmentResult>
}
