import { defineConfig } from 'tsup';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  entry: {
    index: 'src/index.ts',

    commands: 'src/commands/index.ts',
    ssr: 'src/ssr/index.ts',

    'jsx-runtime': 'src/jsx/jsx-runtime.ts',
    'jsx-dev-runtime': 'src/jsx/jsx-dev-runtime.ts',
  },

  outDir: 'dist',

  format: ['esm'],

  dts: true,
  sourcemap: true,
  clean: true,

  treeshake: true,
  splitting: false,

  esbuildOptions(options) {
    options.treeShaking = true;
    options.jsx = 'automatic';
    options.jsxImportSource = 'widgetry-jsx';
    // The JSX import source is an alias onto our own runtime.
    options.alias = {
      'widgetry-jsx': fileURLToPath(new URL('./src/jsx', import.meta.url)),
    };
  },
});
