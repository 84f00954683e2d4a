import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/cli.ts'],
  format: ['esm'],
  dts: true,
  clean: true,
  sourcemap: true,
  target: 'es2022',
  outDir: 'dist',
  splitting: false,
  bundle: true,
  external: [
    // Runtime dependencies resolve from node_modules
    'chalk',
    'cheerio',
    'commander',
    'domhandler',
    'domutils',
    'strip-ansi',
    'yaml',
    'zod'
  ]
});
