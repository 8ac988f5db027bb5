/**
 * Doctor (preflight) barrel export.
 */

export { runDoctor } from './runner.js'
export type { RunDoctorOptions } from './runner.js'
export { checkPlatform, checkSpctl, checkSwVers } from './checks.js'
export type { DoctorCheckFn } from './types.js'
