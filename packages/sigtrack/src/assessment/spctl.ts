/**
 * Assessment through the macOS `spctl` tool.
 *
 * @remarks
 * Runs `spctl --assess --raw` so that the assessment is printed on stdout as
 * an XML property list. Diagnostics (`accepted`, `rejected`, `source=...`)
 * go to stderr and are passed through untouched.
 *
 * @packageDocumentation
 */

import plist from 'plist'
import type { PlistValue } from 'plist'
import { execCommandFull } from '../util/exec.js'
import { AssessmentContractError } from '../errors.js'
import type { AssessmentMode } from '../types.js'
import type { AssessmentResult, Assessor } from './types.js'

/** Key of the reported signing identity in the structured assessment. */
export const ORIGINATOR_KEY = 'assessment:originator'

function isDictionary(value: PlistValue): value is Record<string, PlistValue> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !Buffer.isBuffer(value)
  )
}

/**
 * Parse `spctl --raw` output and keep its scalar top-level entries as strings.
 *
 * @throws {AssessmentContractError} if `xml` is not a dictionary property list.
 */
export function parseAssessmentPlist(xml: string, targetPath: string): Record<string, string> {
  let parsed: PlistValue
  try {
    parsed = plist.parse(xml)
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err)
    throw new AssessmentContractError(
      `Assessment of ${targetPath} returned an unreadable property list: ${detail}`,
      targetPath,
    )
  }
  if (!isDictionary(parsed)) {
    throw new AssessmentContractError(
      `Assessment of ${targetPath} did not return a dictionary`,
      targetPath,
    )
  }

  const output: Record<string, string> = {}
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string') {
      output[key] = value
    } else if (typeof value === 'boolean' || typeof value === 'number') {
      output[key] = String(value)
    }
  }
  return output
}

/**
 * Build the `spctl` argument list for one assessment. Bundles assessed in
 * `open` mode are judged by their primary signature.
 */
export function spctlArgs(targetPath: string, mode: AssessmentMode): string[] {
  const args = ['--assess', '--type', mode]
  if (mode === 'open') {
    args.push('--context', 'context:primary-signature')
  }
  args.push('--raw', '-v', targetPath)
  return args
}

/**
 * {@link Assessor} backed by `spctl`.
 * @public
 */
export class SpctlAssessor implements Assessor {
  readonly #command: string

  /** @param command - The `spctl` executable. Defaults to `spctl` on `PATH`. */
  constructor(command = 'spctl') {
    this.#command = command
  }

  async assess(targetPath: string, mode: AssessmentMode): Promise<AssessmentResult> {
    const result = await execCommandFull(this.#command, spctlArgs(targetPath, mode))
    const diagnostic = result.stderr.trim()
    if (result.exitCode !== 0) {
      return { status: result.exitCode, diagnostic }
    }
    return {
      status: 0,
      output: parseAssessmentPlist(result.stdout, targetPath),
      diagnostic,
    }
  }
}

/**
 * Return the originator reported by a successful assessment.
 *
 * @throws {AssessmentContractError} if the originator entry is missing.
 */
export function extractOriginator(result: AssessmentResult, targetPath: string): string {
  const originator = result.output?.[ORIGINATOR_KEY]
  if (originator === undefined) {
    throw new AssessmentContractError(
      `Assessment of ${targetPath} succeeded without reporting ${ORIGINATOR_KEY}`,
      targetPath,
    )
  }
  return originator
}
