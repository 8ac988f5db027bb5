import { vi } from 'vitest'
import type { AssessmentResult, Assessor } from '../../src/assessment/types.js'
import type { AssessmentMode } from '../../src/types.js'

/** Successful assessment reporting `originator`. */
export function accepted(originator: string): AssessmentResult {
  return {
    status: 0,
    output: { 'assessment:originator': originator, 'assessment:verdict': 'true' },
    diagnostic: 'accepted',
  }
}

/** Rejected assessment with `diagnostic` as the authority's stderr. */
export function rejected(diagnostic: string, status = 3): AssessmentResult {
  return { status, diagnostic }
}

/**
 * An assessor answering from `answers`, keyed by the path it is asked about.
 * Unknown paths are rejected.
 */
export function fakeAssessor(answers: Record<string, AssessmentResult>) {
  const assess = vi.fn((targetPath: string, _mode: AssessmentMode) =>
    Promise.resolve(answers[targetPath] ?? rejected(`${targetPath}: rejected`)),
  )
  const assessor: Assessor = { assess }
  return { assessor, assess }
}
