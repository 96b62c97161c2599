import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    env: {
      SF_DISABLE_LOG_FILE: 'true',
      SFDX_DISABLE_LOG_FILE: 'true',
    },
  },
});
