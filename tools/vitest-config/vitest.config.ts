import { defineConfig } from 'vitest/config';

import { defineConfig as defineBaseConfig } from './src/index';

export default defineConfig(
  defineBaseConfig({
    test: {
      name: 'vitest-config',
    },
  }),
);
