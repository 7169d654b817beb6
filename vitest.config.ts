import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (path: string): string => fileURLToPath(new URL(`./packages/layout-engine/${path}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@leafline/contracts': source('contracts/src/index.ts'),
      '@leafline/measuring-terminal': source('measuring/terminal/src/index.ts'),
      '@leafline/xhtml-adapter': source('xhtml-adapter/src/index.ts'),
      '@leafline/layout-engine': source('layout-engine/src/index.ts'),
      '@leafline/layout-bridge': source('layout-bridge/src/index.ts'),
      '@leafline/painter-terminal': source('painters/terminal/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
