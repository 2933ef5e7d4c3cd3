import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['tests/**/*.test.ts'],
    // Follow tests poll real files; give them headroom on slow CI disks
    testTimeout: 10000,
    // Run test files in sequence to avoid temp-dir and stdout contention
    fileParallelism: false,
  },
});
