/**
 * Originator pattern barrel export.
 */

export type { OriginatorPattern } from './pattern.js'

export {
  TEAM_ID_PREFIX,
  escapeRegExp,
  parseOriginatorPattern,
  formatOriginatorPattern,
  canonicalizeOriginator,
  matchesOriginator,
} from './pattern.js'
