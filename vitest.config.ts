import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));
const packages = ['protocol', 'utils', 'config', 'sdk', 'network'];

export default defineConfig({
  resolve: {
    alias: [
      // Subpath imports first, then package entries
      ...packages.map((name) => ({
        find: new RegExp(`^@agent-mesh/${name}/(.+)$`),
        replacement: path.resolve(rootDir, `./packages/${name}/src/$1.ts`),
      })),
      ...packages.map((name) => ({
        find: new RegExp(`^@agent-mesh/${name}$`),
        replacement: path.resolve(rootDir, `./packages/${name}/src/index.ts`),
      })),
    ],
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.test.ts'],
    },
  },
});
