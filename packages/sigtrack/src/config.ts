/**
 * Configuration loading, validation, and defaults for sigtrack.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import * as os from 'node:os'
import { ConfigError } from './errors.js'
import { expandHome } from './store/paths.js'
import type { SigtrackConfig } from './types.js'

/** Name of the expectations file inside the config directory. */
export const DEFAULT_STORE_FILENAME = 'expectations.json'

/** Return the platform-appropriate default config directory. */
export function getDefaultConfigDir(): string {
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA
    if (appData !== undefined) {
      return path.join(appData, 'sigtrack')
    }
    return path.join(os.homedir(), 'AppData', 'Roaming', 'sigtrack')
  }
  return path.join(os.homedir(), '.config', 'sigtrack')
}

/** Default configuration when no config file exists. */
export function defaultConfig(): SigtrackConfig {
  return {
    version: 1,
    substituteHome: true,
    spctlPath: 'spctl',
  }
}

/**
 * Type guard for plain objects.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validate an unknown value as a SigtrackConfig, throwing on invalid structure.
 * Omitted optional fields take their default values.
 */
export function validateConfig(config: unknown): SigtrackConfig {
  if (!isObject(config)) {
    throw new ConfigError('Config must be an object')
  }

  if (typeof config.version !== 'number' || config.version !== 1) {
    throw new ConfigError('Config version must be 1')
  }

  const result = defaultConfig()

  if (config.storePath !== undefined) {
    if (typeof config.storePath !== 'string' || config.storePath.trim() === '') {
      throw new ConfigError('Config storePath must be a non-empty string')
    }
    result.storePath = config.storePath
  }

  if (config.substituteHome !== undefined) {
    if (typeof config.substituteHome !== 'boolean') {
      throw new ConfigError('Config substituteHome must be a boolean')
    }
    result.substituteHome = config.substituteHome
  }

  if (config.spctlPath !== undefined) {
    if (typeof config.spctlPath !== 'string' || config.spctlPath.trim() === '') {
      throw new ConfigError('Config spctlPath must be a non-empty string')
    }
    result.spctlPath = config.spctlPath
  }

  return result
}

/**
 * Load the sigtrack config from disk, falling back to defaults if the file
 * does not exist.
 *
 * @param configDir - Directory containing config.json. Defaults to platform-appropriate path.
 */
export async function loadConfig(configDir?: string): Promise<SigtrackConfig> {
  const dir = configDir ?? getDefaultConfigDir()
  const configPath = path.join(dir, 'config.json')

  let raw: string
  try {
    raw = await fs.readFile(configPath, 'utf-8')
  } catch {
    return defaultConfig()
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new ConfigError(`Failed to parse config file at ${configPath}`)
  }

  return validateConfig(parsed)
}

/**
 * Resolve where the expectations file lives: an explicit override wins, then
 * the configured `storePath` (relative to the config directory), then the
 * default file inside the config directory.
 */
export function resolveStorePath(
  config: SigtrackConfig,
  configDir: string,
  override?: string,
): string {
  const candidate = override ?? config.storePath
  if (candidate === undefined) {
    return path.join(configDir, DEFAULT_STORE_FILENAME)
  }
  const expanded = expandHome(candidate, os.homedir())
  if (expanded !== candidate) {
    return expanded
  }
  return override !== undefined ? path.resolve(candidate) : path.resolve(configDir, candidate)
}
