import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const srcPath = (dir: string): string => fileURLToPath(new URL(`./src/${dir}`, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
    setupFiles: ['./tests/setup.ts'],
  },
  resolve: {
    alias: {
      '@shared': srcPath('shared'),
      '@core': srcPath('core'),
      '@scalers': srcPath('scalers'),
      '@kube': srcPath('kubernetes'),
    },
  },
});
