/**
 * Lexical path helpers used for store-key resolution.
 *
 * Nothing in this module touches the filesystem. Store keys are always
 * POSIX-style paths, so the `node:path` POSIX flavour is used explicitly.
 */

import * as path from 'node:path'

/** Marker for the user's home directory in store keys. */
export const HOME_MARKER = '~'

/**
 * Collapse `.`, `..` and repeated separators, and drop a trailing separator.
 * The root path `/` is returned unchanged.
 */
export function normalizePath(input: string): string {
  const normalized = path.posix.normalize(input)
  if (normalized.length > 1 && normalized.endsWith('/')) {
    return normalized.slice(0, -1)
  }
  return normalized
}

/**
 * Replace a leading `~` (alone or followed by `/`) with `homeDir`.
 * `~user` forms are returned unchanged.
 */
export function expandHome(input: string, homeDir: string): string {
  if (input === HOME_MARKER) {
    return homeDir
  }
  if (input.startsWith(`${HOME_MARKER}/`)) {
    return path.posix.join(homeDir, input.slice(2))
  }
  return input
}

/** `true` when `candidate` is `homeDir` itself or a path beneath it. */
export function isUnderHome(candidate: string, homeDir: string): boolean {
  if (homeDir === '/') return false
  return candidate === homeDir || candidate.startsWith(`${homeDir}/`)
}

/**
 * Rewrite a path under `homeDir` to start with the home marker. Paths outside
 * the home directory are returned unchanged.
 */
export function toHomeRelative(candidate: string, homeDir: string): string {
  if (!isUnderHome(candidate, homeDir)) {
    return candidate
  }
  return `${HOME_MARKER}${candidate.slice(homeDir.length)}`
}
