import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./app/style-engine', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['app/**/tests/**/*.test.ts', 'packages/**/*.test.ts'],
    restoreMocks: true,
  },
});
