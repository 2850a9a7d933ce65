import { defineConfig } from 'vitest/config';
import path from 'node:path';

function workspaceEntry(pkg: string): string {
  return path.resolve(import.meta.dirname, 'packages', pkg, 'src/index.ts');
}

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
  },
  resolve: {
    alias: {
      '@mailsift/core': workspaceEntry('core'),
      '@mailsift/recognizer': workspaceEntry('recognizer'),
      '@mailsift/classifier': workspaceEntry('classifier'),
    },
  },
});
