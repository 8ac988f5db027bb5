/**
 * Assessment collaborator barrel export.
 */

export type { AssessmentResult, Assessor } from './types.js'

export { inferAssessmentMode } from './mode.js'

export {
  ORIGINATOR_KEY,
  SpctlAssessor,
  extractOriginator,
  parseAssessmentPlist,
  spctlArgs,
} from './spctl.js'
