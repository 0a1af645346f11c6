import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Workspace packages run from their sources; their `default` exports point at built output
const coreSource = (path: string) => fileURLToPath(new URL(`./packages/core/src/${path}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: '@dateparse/core/types', replacement: coreSource('types/index.ts') },
      { find: '@dateparse/core/parsers', replacement: coreSource('parsers/index.ts') },
      { find: '@dateparse/core', replacement: coreSource('index.ts') },
    ],
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts', 'apps/*/tests/**/*.test.ts'],
    environment: 'node',
  },
});
