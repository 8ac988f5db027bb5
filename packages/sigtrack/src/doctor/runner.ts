/**
 * Doctor runner: orchestrates preflight checks and aggregates results.
 *
 * @packageDocumentation
 */

import { checkPlatform, checkSpctl, checkSwVers } from './checks.js'
import { currentPlatform } from '../util/platform.js'
import type { Platform } from '../util/platform.js'
import type { PreflightCheck, PreflightCheckStatus, PreflightResult } from '../types.js'
import type { DoctorCheckFn } from './types.js'

/** Options for running the doctor. */
export interface RunDoctorOptions {
  /** Override the platform detection (useful for testing). */
  platform?: Platform | undefined
  /** The `spctl` executable to probe. */
  spctlPath?: string | undefined
}

/** A doctor check entry pairing the check function with whether it is required. */
interface CheckEntry {
  check: DoctorCheckFn
  required: boolean
}

/** Aggregated check entry with its result. */
interface ResolvedEntry {
  required: boolean
  result: PreflightCheck
}

function buildCheckList(platform: Platform, spctlPath: string): CheckEntry[] {
  const entries: CheckEntry[] = [{ check: () => checkPlatform(platform), required: true }]
  if (platform === 'darwin') {
    entries.push(
      { check: () => checkSpctl(spctlPath), required: true },
      { check: checkSwVers, required: false },
    )
  }
  return entries
}

function nextStepFor(result: PreflightCheck, status: Exclude<PreflightCheckStatus, 'ok'>): string {
  switch (status) {
    case 'missing':
      return `Install missing required dependency: ${result.name}`
    case 'disabled':
      return 'Re-enable Gatekeeper assessments: sudo spctl --master-enable'
    case 'unsupported':
      return `${result.name} is unsupported${result.reason !== undefined ? `: ${result.reason}` : ''}`
  }
}

/**
 * Run all platform-appropriate preflight checks and aggregate the results.
 */
export async function runDoctor(options?: RunDoctorOptions): Promise<PreflightResult> {
  const platform = options?.platform ?? currentPlatform()
  const entries = buildCheckList(platform, options?.spctlPath ?? 'spctl')

  const resolved: ResolvedEntry[] = await Promise.all(
    entries.map(async ({ check, required }) => {
      const result = await check()
      return { required, result }
    }),
  )

  const warnings: string[] = []
  const nextSteps: string[] = []

  for (const { required, result } of resolved) {
    if (result.status === 'ok') continue
    if (required) {
      nextSteps.push(nextStepFor(result, result.status))
    } else {
      warnings.push(
        `Optional check ${result.name} did not pass${result.reason !== undefined ? ` — ${result.reason}` : ''}`,
      )
    }
  }

  return {
    checks: resolved.map(({ result }) => result),
    ready: nextSteps.length === 0,
    warnings,
    nextSteps,
  }
}
