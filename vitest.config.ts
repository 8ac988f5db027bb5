import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

// Workspace packages resolve to their sources, not their build output.
const source = (relativePath: string): string =>
  fileURLToPath(new URL(relativePath, import.meta.url))

export default defineConfig({
  resolve: {
    alias: [
      { find: /^sigtrack$/, replacement: source('./packages/sigtrack/src/index.ts') },
      {
        find: /^@sigtrack\/test-helpers$/,
        replacement: source('./packages/test-helpers/src/index.ts'),
      },
    ],
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
  },
})
