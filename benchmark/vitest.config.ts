import { defineConfig } from 'vitest/config'
import { dirname, resolve } from 'path'
import { fileURLToPath } from 'url'

const __dirname = dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@optcb/core': resolve(__dirname, '../packages/@optcb/core/src/index.ts'),
    },
  },
  test: {
    name: 'benchmark',
    root: __dirname,
    include: ['lib/**/*.test.ts'],
    globals: true,
    environment: 'node',
    setupFiles: [resolve(__dirname, '../vitest.setup.ts')],
  },
})
