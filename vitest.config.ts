import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));
const alias = {
  '@linkwalk/core': fromRoot('./libs/linkwalk-core/src/index.ts'),
  '@linkwalk/pagination': fromRoot('./libs/linkwalk-pagination/src/index.ts'),
  '@linkwalk/download': fromRoot('./libs/linkwalk-download/src/index.ts'),
};

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/*/src/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
