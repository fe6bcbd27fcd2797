import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['shared/src/**/*.test.ts', 'backend/src/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
    },
  },
});
