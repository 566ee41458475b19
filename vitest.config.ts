import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: '@valuescope/shared/test-utils', replacement: fromRoot('./packages/shared/src/test-utils/fixtures.ts') },
      { find: /^@valuescope\/shared$/, replacement: fromRoot('./packages/shared/src/index.ts') },
      { find: /^@valuescope\/clients$/, replacement: fromRoot('./packages/clients/src/index.ts') },
    ],
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
