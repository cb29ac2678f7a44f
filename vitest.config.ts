import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const PACKAGES = ['contracts', 'shared', 'documents', 'kernel', 'cli'] as const;

// Tests run against the TypeScript sources of each workspace package, not its build output
const alias = Object.fromEntries(
  PACKAGES.map((name) => [
    `@brdocs/${name}`,
    fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url)),
  ]),
);

export default defineConfig({
  resolve: { alias },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
