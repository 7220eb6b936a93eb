import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for zotero-mcp-lite
 *
 * Every suite runs in-process: HTTP sources are stubbed with
 * `vi.stubGlobal('fetch', ...)` and database suites build their own SQLite
 * files under the OS temp directory.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/__tests__/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    // better-sqlite3 is a native module; forks keep each suite in its own process.
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', 'vitest.config.ts', 'vitest.setup.ts'],
    },
  },
});
