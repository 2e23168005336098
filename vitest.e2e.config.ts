import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'backend/tests/**/*.e2e.test.ts',  // E2E tests only
    ],
    exclude: [
      'node_modules/**',
    ],
    env: {
      TZ: 'UTC',
      LOG_LEVEL: 'warn',
      VECTOR_STORE_TYPE: 'memory',
      DHL_API_KEY: '',
    },
    testTimeout: 60000, // real model calls
    hookTimeout: 120000, // FAQ ingestion embeds every entry
  },
});
