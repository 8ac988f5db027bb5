import { describe, it, expect } from 'vitest'
import * as fs from 'node:fs/promises'
import { fileURLToPath } from 'node:url'

const repoRoot = new URL('../../../../', import.meta.url)

async function readJson(relativePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(new URL(relativePath, repoRoot), 'utf8'))
}

describe('built package layout', () => {
  it.each(['sigtrack', 'test-helpers', 'cli'])(
    'packages/%s exports sources for types and compiled output at run time',
    async (name) => {
      expect(await readJson(`packages/${name}/package.json`)).toMatchObject({
        exports: { '.': { types: './src/index.ts', default: './dist/index.js' } },
        main: './dist/index.js',
      })
      expect(await readJson(`packages/${name}/tsconfig.build.json`)).toMatchObject({
        compilerOptions: { composite: true, rootDir: 'src', outDir: 'dist' },
      })
    },
  )

  it('points the executable at the compiled entry point of the CLI', async () => {
    expect(await readJson('package.json')).toMatchObject({
      bin: { sigtrack: 'packages/cli/dist/bin.js' },
    })
    const entry = await fs.stat(fileURLToPath(new URL('packages/cli/src/bin.ts', repoRoot)))
    expect(entry.isFile()).toBe(true)
  })

  it('builds the library before the packages that depend on it', async () => {
    for (const name of ['test-helpers', 'cli']) {
      expect(await readJson(`packages/${name}/tsconfig.build.json`)).toMatchObject({
        references: [{ path: '../sigtrack/tsconfig.build.json' }],
      })
    }
  })
})
