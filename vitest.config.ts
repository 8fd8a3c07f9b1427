import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@ipscout/core': pkg('core'),
      '@ipscout/fallback': pkg('fallback'),
      '@ipscout/dns': pkg('dns'),
      '@ipscout/http': pkg('http'),
      ipscout: pkg('ipscout'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    env: {
      IPSCOUT_LOG_LEVEL: 'silent',
    },
    include: ['test/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', 'test/', '**/*.d.ts'],
    },
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
