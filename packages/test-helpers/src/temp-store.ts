/**
 * Temporary store and target directory for tests.
 */

import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { ExpectationStore } from 'sigtrack'
import type { ExpectationStoreOptions } from 'sigtrack'

/**
 * A scratch directory holding an expectations file and fake targets.
 *
 * @remarks
 * The directory doubles as the home directory, so targets created under it
 * are stored with `~/` keys when home substitution is on.
 *
 * @public
 */
export class TempStore {
  /** Root of the scratch directory, used as the home directory. */
  readonly dir: string

  /** Location of the expectations file inside {@link dir}. */
  readonly storePath: string

  private constructor(dir: string) {
    this.dir = dir
    this.storePath = path.join(dir, 'expectations.json')
  }

  /** Create a fresh scratch directory. */
  static async create(): Promise<TempStore> {
    const dir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'sigtrack-test-')))
    return new TempStore(dir)
  }

  /**
   * Create a fake bundle directory at `relativePath` below {@link dir} and
   * return its absolute path.
   */
  async makeTarget(relativePath: string): Promise<string> {
    const target = path.join(this.dir, relativePath)
    await fs.mkdir(target, { recursive: true })
    return target
  }

  /** Write raw JSON content as the expectations file. */
  async writeRaw(content: unknown): Promise<void> {
    await fs.writeFile(this.storePath, `${JSON.stringify(content, null, 2)}\n`, 'utf8')
  }

  /** Read the expectations file back as parsed JSON. */
  async readRaw(): Promise<unknown> {
    return JSON.parse(await fs.readFile(this.storePath, 'utf8'))
  }

  /** Load the store with this directory as the home directory. */
  load(options?: Omit<ExpectationStoreOptions, 'homeDir'>): Promise<ExpectationStore> {
    return ExpectationStore.load(this.storePath, { ...options, homeDir: this.dir })
  }

  /** Remove the scratch directory. */
  async cleanup(): Promise<void> {
    await fs.rm(this.dir, { recursive: true, force: true })
  }
}
