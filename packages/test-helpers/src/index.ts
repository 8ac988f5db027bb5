/**
 * @sigtrack/test-helpers — Test utilities for sigtrack consumers.
 *
 * @packageDocumentation
 */

export { ScriptedAssessor } from './scripted-assessor.js'
export type { AssessmentCall } from './scripted-assessor.js'
export { TempStore } from './temp-store.js'
