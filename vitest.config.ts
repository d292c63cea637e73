import react from '@vitejs/plugin-react';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [react()],
  test: {
    include: ['webui/src/**/*.test.{ts,tsx}', 'server/src/**/*.test.ts'],
    globals: true,
    environment: 'jsdom',
    environmentMatchGlobs: [['server/**', 'node']],
    restoreMocks: true
  }
});
