import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages are tested from their sources, not their build output
    alias: [
      {
        find: /^@gitbrief\/(core|integrations|report)$/,
        replacement: path.join(root, 'packages/$1/src/index.ts'),
      },
    ],
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 10_000,
  },
});
