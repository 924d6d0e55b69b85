import path from 'node:path';
import { defineConfig } from 'vitest/config';

const alias = {
  '@libs/p2p-http-core': path.resolve(__dirname, 'libs/p2p-http-core/src/index.ts'),
  '@libs/p2p-client': path.resolve(__dirname, 'libs/p2p-client/src/index.ts'),
};

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/*/src/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
