/**
 * Originator patterns: how an expected signing identity is stored and how it
 * is compared against the identity reported by the assessment authority.
 *
 * Two forms exist on disk:
 *
 * - `id:<TEAMID>` matches any reported originator ending in `(<TEAMID>)`,
 *   e.g. `Developer ID Application: Example Corp (ABCDE12345)`.
 * - Any other string is a regular expression searched for in the reported
 *   originator. Patterns recorded by sigtrack itself are anchored literals
 *   (`^...$`); hand-written ones may be looser.
 *
 * @packageDocumentation
 */

/** Prefix of the short team-identifier form. */
export const TEAM_ID_PREFIX = 'id:'

const TRAILING_TEAM_ID = /\(([A-Za-z0-9]+)\)$/

/**
 * Parsed form of a stored originator pattern.
 * @public
 */
export type OriginatorPattern =
  | { kind: 'team-id'; teamId: string }
  | { kind: 'anchored'; source: string }

/** Escape every regular-expression metacharacter in `text`. */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&')
}

/**
 * Parse a stored pattern string.
 *
 * @throws {SyntaxError} if a non-`id:` pattern is not a valid regular expression.
 */
export function parseOriginatorPattern(stored: string): OriginatorPattern {
  if (stored.startsWith(TEAM_ID_PREFIX)) {
    return { kind: 'team-id', teamId: stored.slice(TEAM_ID_PREFIX.length) }
  }
  // Throws for an invalid expression.
  new RegExp(stored)
  return { kind: 'anchored', source: stored }
}

/** Render a pattern back to its stored string form. */
export function formatOriginatorPattern(pattern: OriginatorPattern): string {
  switch (pattern.kind) {
    case 'team-id':
      return `${TEAM_ID_PREFIX}${pattern.teamId}`
    case 'anchored':
      return pattern.source
  }
}

/**
 * Derive the pattern to store for a freshly observed originator: the short
 * team-id form when the originator ends in a parenthesised alphanumeric
 * token, otherwise an anchored literal of the whole string.
 */
export function canonicalizeOriginator(reported: string): OriginatorPattern {
  const match = TRAILING_TEAM_ID.exec(reported)
  const teamId = match?.[1]
  if (teamId !== undefined) {
    return { kind: 'team-id', teamId }
  }
  return { kind: 'anchored', source: `^${escapeRegExp(reported)}$` }
}

/** `true` when the reported originator satisfies `pattern`. */
export function matchesOriginator(pattern: OriginatorPattern, reported: string): boolean {
  switch (pattern.kind) {
    case 'team-id':
      return reported.endsWith(`(${pattern.teamId})`)
    case 'anchored':
      return new RegExp(pattern.source).test(reported)
  }
}
