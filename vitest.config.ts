import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';

// Pipeline tests run under node; component tests opt into jsdom per file
export default defineConfig({
  plugins: [react()],
  test: {
    include: ['strata/src/**/*.test.ts', 'relief/src/**/*.test.{ts,tsx}'],
    environment: 'node',
    setupFiles: ['./vitest.setup.ts'],
    // Pipeline tests share SQLite files under strata/data
    fileParallelism: false,
  },
});
