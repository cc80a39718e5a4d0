import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'src/**/*.test.tsx'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts', 'src/**/*.tsx'],
      exclude: ['src/**/*.test.ts', 'src/**/*.test.tsx', 'src/cli/index.ts', 'src/index.ts'],
    },
  },
  resolve: {
    alias: {
      '@domain': fromRoot('./src/domain'),
      '@infra': fromRoot('./src/infrastructure'),
      '@features': fromRoot('./src/features'),
      '@shared': fromRoot('./src/shared'),
      '@cli': fromRoot('./src/cli'),
    },
  },
});
