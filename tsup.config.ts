import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  clean: true,
  sourcemap: true,
  target: 'es2022',
  outDir: 'dist',
  splitting: false,
  bundle: true,
  external: [
    // Native parser bindings must be loaded from node_modules at runtime
    'tree-sitter',
    'tree-sitter-python',
    'chalk',
    'commander',
    'strip-ansi',
    'zod'
  ]
});
