/**
 * Default assessment mode for a path.
 */

import type { AssessmentMode } from '../types.js'

/**
 * Bundles under `/Library/` that are loaded by a host process rather than
 * executed on their own.
 */
const OPEN_MODE_PATH = /^\/Library\/.+\.(?:prefPane|plugin|bundle|pkg|mpkg)$/

/** Infer the assessment mode for an expanded, normalized path. */
export function inferAssessmentMode(targetPath: string): AssessmentMode {
  return OPEN_MODE_PATH.test(targetPath) ? 'open' : 'execute'
}
