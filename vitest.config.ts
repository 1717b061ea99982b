import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@rollcall/shared': resolve(__dirname, 'shared/src/index.ts'),
    },
  },
  test: {
    include: ['shared/src/**/*.test.ts', 'backend/src/**/*.test.ts'],
    environment: 'node',
    clearMocks: true,
  },
});
