import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration for netmeta-mcp
 *
 * Every suite runs in-process: the R subprocess boundary is mocked
 * (execa or an injected ProcessInvoker) and the MCP server is exercised
 * through the SDK's in-memory transport.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        'vitest.config.ts',
        'vitest.setup.ts',
      ],
    },
  },
});
