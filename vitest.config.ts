import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.{test,spec}.ts', 'apps/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // Raw-store tests touch the filesystem under os.tmpdir()
    testTimeout: 30000,

    // Adapter tests replace globalThis.fetch; keep files isolated
    pool: 'forks',
  },
})
