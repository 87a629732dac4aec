import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['config/**/*.test.ts', 'services/**/*.test.ts', 'utils/**/*.test.ts']
  }
});
