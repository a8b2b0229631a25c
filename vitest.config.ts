import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    restoreMocks: true,
    unstubEnvs: true,
    env: {
      CASCADE_CONTAINER_LOG_LEVEL: 'silent',
    },
  },
});
