import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    environment: 'jsdom',
    globals: true,
    include: ['tests/**/*.test.{ts,tsx}'],
    setupFiles: ['tests/setup-env.ts'],
  },
  esbuild: {
    jsx: 'automatic',
    // Use the package-style import so tooling resolves consistently
    jsxImportSource: 'widgetry-jsx',
  },
  resolve: {
    alias: {
      // Tests run against source, not built dist artifacts.
      'widgetry-jsx': fileURLToPath(new URL('./src/jsx', import.meta.url)),
    },
  },
});
