/**
 * Shared handling of `--store`, `--config-dir` and `--no-home`.
 *
 * @internal
 */

import { ExpectationStore, getDefaultConfigDir, loadConfig, resolveStorePath } from 'sigtrack'
import type { SigtrackConfig } from 'sigtrack'
import type { CommandDeps, StoreLocationOptions } from './types.js'

/** `parseArgs` option definitions shared by every store-reading command. */
export const STORE_LOCATION_OPTIONS = {
  store: { type: 'string' },
  'config-dir': { type: 'string' },
  'no-home': { type: 'boolean' },
} as const

/** Load config, then the expectations store it points at. */
export async function openStore(
  options: StoreLocationOptions,
  deps?: CommandDeps,
): Promise<{ config: SigtrackConfig; store: ExpectationStore }> {
  const configDir = options.configDir ?? getDefaultConfigDir()
  const config = await loadConfig(configDir)
  const storePath = resolveStorePath(config, configDir, options.store)
  const store = await ExpectationStore.load(storePath, {
    substituteHome: options.noHome === true ? false : config.substituteHome,
    homeDir: deps?.homeDir,
  })
  return { config, store }
}
