import { resolve } from 'node:path';
import * as url from 'node:url';
import { defineConfig } from 'vitest/config';

const dirname = url.fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  test: {
    name: 'accept-encoding',
    environment: 'node',
    include: ['**/__tests__/*.test.ts'],
    root: resolve(dirname),
  },
});
