import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  // Benchmarks should run without dev logging noise.
  define: {
    'process.env.NODE_ENV': '"production"',
  },
  test: {
    environment: 'node',
    globals: true,
    include: ['benches/**/*.bench.{ts,tsx}'],
    benchmark: {
      include: ['benches/**/*.bench.{ts,tsx}'],
    },
  },
  esbuild: {
    jsx: 'automatic',
    jsxImportSource: 'widgetry-jsx',
  },
  resolve: {
    alias: {
      'widgetry-jsx': fileURLToPath(new URL('./src/jsx', import.meta.url)),
    },
  },
});
