import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Keep test output quiet; suites that assert on logs spy on the logger
process.env.LOG_LEVEL ??= 'silent';

const workspacePath = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.config.{js,ts}',
        '**/*.d.ts',
        '**/index.ts',
      ],
    },
  },
  resolve: {
    alias: {
      '@recycler/core': workspacePath('./packages/core/src/index.ts'),
      '@recycler/observability': workspacePath('./packages/observability/src/index.ts'),
      '@recycler/types': workspacePath('./packages/types/src/index.ts'),
    },
  },
});
