import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const workspace = (path: string) => fileURLToPath(new URL(path, import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@fir-workbench/fir-core': workspace('./packages/fir-core/src/index.ts'),
      '@fir-workbench/config': workspace('./packages/config/src/index.ts'),
      '@fir-workbench/shared': workspace('./packages/shared/src/schemas/index.ts'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    environment: 'node',
  },
})
