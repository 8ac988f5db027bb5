/**
 * Individual preflight check functions.
 */

import { execCommand, execCommandFull } from '../util/exec.js'
import type { Platform } from '../util/platform.js'
import type { PreflightCheck } from '../types.js'

/**
 * Check that the platform has a signature assessment authority (macOS only).
 * @internal
 */
export function checkPlatform(platform: Platform): Promise<PreflightCheck> {
  const name = 'platform'
  if (platform === 'darwin') {
    return Promise.resolve({ name, status: 'ok', version: platform })
  }
  return Promise.resolve({
    name,
    status: 'unsupported',
    version: platform,
    reason: 'signature assessment requires macOS',
  })
}

/**
 * Check that `spctl` is present and that assessments are enabled.
 *
 * `spctl --status` prints `assessments enabled` or `assessments disabled`;
 * the exit status alone does not distinguish a disabled system from a
 * broken one.
 * @internal
 */
export async function checkSpctl(command = 'spctl'): Promise<PreflightCheck> {
  const name = 'spctl'
  let output: string
  try {
    const result = await execCommandFull(command, ['--status'])
    output = `${result.stdout}${result.stderr}`.trim()
  } catch {
    return { name, status: 'missing', reason: `${command} not found in PATH` }
  }

  if (output.includes('assessments enabled')) {
    return { name, status: 'ok', version: output }
  }
  if (output.includes('assessments disabled')) {
    return { name, status: 'disabled', version: output, reason: 'Gatekeeper assessments are disabled' }
  }
  return {
    name,
    status: 'unsupported',
    version: output,
    reason: `Unrecognized ${command} --status output`,
  }
}

/**
 * Report the macOS product version. Informational only.
 * @internal
 */
export async function checkSwVers(): Promise<PreflightCheck> {
  const name = 'sw_vers'
  try {
    const version = await execCommand('sw_vers', ['-productVersion'])
    return { name, status: 'ok', version }
  } catch {
    return { name, status: 'missing', reason: 'sw_vers not found in PATH' }
  }
}
