import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tool-mocks/src/**/*.test.ts'],
    environment: 'node',
    setupFiles: ['tool-mocks/src/testSetup.ts']
  }
});
