import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      REDIS_ENABLED: 'false',
      NODE_ENV: 'test',
    },
  },
});
