import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const alias = {
  'query-composite': fileURLToPath(new URL('./src/index.ts', import.meta.url)),
};

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: 'unit',
          include: ['tests/unit/**/*.test.ts'],
          testTimeout: 5000,
        },
      },
      {
        resolve: { alias },
        test: {
          name: 'app',
          include: ['directory-app/tests/**/*.test.ts'],
          testTimeout: 10000,
        },
      },
    ],
  },
});
