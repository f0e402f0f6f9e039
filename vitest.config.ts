import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import * as path from 'path';

const root = path.dirname(fileURLToPath(import.meta.url));

const packages = ['types', 'crypto', 'keystore', 'core', 'rpc', 'sdk', 'cli'];

const alias: Record<string, string> = {};
for (const pkg of packages) {
  alias[`@vowline/${pkg}`] = path.resolve(root, `packages/${pkg}/src/index.ts`);
}

export default defineConfig({
  resolve: { alias },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 15_000,
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.test.ts', 'packages/cli/src/bin.ts'],
      reporter: ['text', 'text-summary'],
    },
  },
});
