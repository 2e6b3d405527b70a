import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: false,
  clean: true,
  sourcemap: true,
  target: 'es2022',
  outDir: 'dist',
  splitting: false,
  bundle: true,
  external: [
    // All dependencies should be external for CLI tool
    '@anthropic-ai/sdk',
    'chalk',
    'commander',
    'fast-glob',
    'openai',
    'strip-ansi',
    'yaml',
    'zod'
  ]
});
