import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['{cli,core,transaction,verification,validation}/**/*.test.ts'],

    environment: 'node',

    pool: 'threads',
  },
});
