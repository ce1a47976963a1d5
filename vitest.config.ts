import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: [
      'tools/logger/vitest.config.ts',
      'tools/vitest-config/vitest.config.ts',
      'packages/shared/vitest.config.ts',
      'packages/scene-analyzer/vitest.config.ts',
    ],
  },
});
