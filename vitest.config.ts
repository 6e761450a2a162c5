import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@chronicler/cli': path.resolve(root, 'packages/cli/src/index.ts'),
      '@chronicler/core': path.resolve(root, 'packages/core/src/index.ts'),
      '@chronicler/llm': path.resolve(root, 'packages/llm/src/index.ts'),
      '@chronicler/test-utils': path.resolve(root, 'packages/test-utils/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 30000,
  },
});
