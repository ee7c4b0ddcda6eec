import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const repoRoot = path.dirname(fileURLToPath(import.meta.url));
const alias = {
  '@strikeline/option-symbols': path.resolve(repoRoot, 'libs/option-symbols/src/index.ts'),
  '@strikeline/options-client': path.resolve(repoRoot, 'libs/options-client/src/index.ts'),
};

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/**/src/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
