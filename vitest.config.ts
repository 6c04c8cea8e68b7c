import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const WORKSPACE_PACKAGES = ['core', 'archive', 'client', 'cli'];

// Tests run against package sources, never against build output
function sourceAliases(): Record<string, string> {
  return Object.fromEntries(
    WORKSPACE_PACKAGES.map((name) => [
      `@report-upload/${name}`,
      fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url)),
    ]),
  );
}

export default defineConfig({
  resolve: {
    alias: sourceAliases(),
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 15000,
  },
});
