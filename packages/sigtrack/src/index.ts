/**
 * sigtrack — record the expected code-signing originator of applications and
 * bundles, and detect when it drifts.
 *
 * @packageDocumentation
 */

export {
  SigtrackError,
  UsageError,
  TargetNotFoundError,
  AssessmentContractError,
  StoreFormatError,
  FilesystemError,
  ConfigError,
} from './errors.js'

export type {
  AssessmentMode,
  ExpectationRecord,
  PreflightCheckStatus,
  PreflightCheck,
  PreflightResult,
  SigtrackConfig,
} from './types.js'
export { ASSESSMENT_MODES, isAssessmentMode } from './types.js'

export type { ExpectationStoreOptions, ResolvedTarget } from './store/index.js'
export {
  ExpectationStore,
  serializeRecords,
  HOME_MARKER,
  normalizePath,
  expandHome,
  isUnderHome,
  toHomeRelative,
} from './store/index.js'

export type { OriginatorPattern } from './originator/index.js'
export {
  TEAM_ID_PREFIX,
  escapeRegExp,
  parseOriginatorPattern,
  formatOriginatorPattern,
  canonicalizeOriginator,
  matchesOriginator,
} from './originator/index.js'

export type { AssessmentResult, Assessor } from './assessment/index.js'
export {
  ORIGINATOR_KEY,
  SpctlAssessor,
  extractOriginator,
  inferAssessmentMode,
  parseAssessmentPlist,
  spctlArgs,
} from './assessment/index.js'

export type {
  ReconcileOptions,
  ReconcilerDeps,
  FailureReason,
  TargetOutcome,
  ReconcileReport,
} from './reconcile/index.js'
export { Reconciler } from './reconcile/index.js'

export { Logger, silentLogger } from './logger.js'
export type { LogLevel, LogSink, LoggerOptions } from './logger.js'

export { runDoctor, checkPlatform, checkSpctl, checkSwVers } from './doctor/index.js'
export type { RunDoctorOptions, DoctorCheckFn } from './doctor/index.js'

export type { Platform } from './util/platform.js'

export {
  loadConfig,
  getDefaultConfigDir,
  validateConfig,
  defaultConfig,
  resolveStorePath,
  DEFAULT_STORE_FILENAME,
} from './config.js'
