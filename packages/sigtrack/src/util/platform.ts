/**
 * Platform detection utilities.
 */

/**
 * @internal
 */
export type Platform = 'darwin' | 'win32' | 'linux' | 'other'

/** Get the current platform, folding anything unusual into `'other'`. */
export function currentPlatform(): Platform {
  const p = process.platform
  if (p === 'darwin' || p === 'win32' || p === 'linux') {
    return p
  }
  return 'other'
}
