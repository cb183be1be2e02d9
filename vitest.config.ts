import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['services/docstore/test/**/*.spec.ts'],
    environment: 'node',
  },
});
