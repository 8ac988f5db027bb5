/**
 * Expectations store barrel export.
 */

export type { ExpectationStoreOptions, ResolvedTarget } from './expectation-store.js'

export { ExpectationStore, serializeRecords } from './expectation-store.js'

export { HOME_MARKER, normalizePath, expandHome, isUnderHome, toHomeRelative } from './paths.js'
