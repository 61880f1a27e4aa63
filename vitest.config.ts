import path from 'path';
import { defineConfig } from 'vitest/config';

// Workspace packages resolve to their sources so tests need no build.
const workspace = (pkg: string) => path.resolve(__dirname, 'packages', pkg, 'src', 'index.ts');

export default defineConfig({
  resolve: {
    alias: {
      '@roster/shared': workspace('shared'),
      '@roster/repo': workspace('repo'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      exclude: ['**/node_modules/**', '**/dist/**', '**/*.test.ts', 'packages/repo/src/git/fake.ts'],
    },
  },
});
