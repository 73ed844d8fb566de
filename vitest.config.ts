import * as path from 'path';
import { tmpdir } from 'os';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    env: {
      GCPKIT_DEBUG_LOG: path.join(tmpdir(), 'gcpkit-test-debug.log'),
    },
  },
});
