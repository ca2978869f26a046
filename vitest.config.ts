import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'packages/prompts/test/**/*.spec.ts',
      'apps/backend/src/**/__tests__/**/*.test.ts',
    ],
  },
  esbuild: { target: 'es2022' },
});
