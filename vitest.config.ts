import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    setupFiles: ['./tests/setup.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      MONGO_URI: 'mongodb://localhost:27017/test',
      STORAGE_PATH: 'data/test',
      THUMBNAIL_PIXEL_BUDGET: '19200'
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', 'scripts/', '**/*.config.ts', '**/*.d.ts', 'tests/**']
    },
    include: ['tests/**/*.{test,spec}.{ts,tsx}']
  }
});
