import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'backend/tests/**/*.test.ts',  // Unit tests only (excludes .e2e.test.ts)
    ],
    exclude: [
      '**/*.e2e.test.ts',  // Needs OPENAI_API_KEY, run with npm run test:e2e
      'node_modules/**',
    ],
    env: {
      TZ: 'UTC',
      LOG_LEVEL: 'silent',
      NODE_ENV: 'test',
    },
    testTimeout: 10000,
  },
});
