import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    cli: 'src/cli/index.ts', // -> dist/cli.js
    index: 'src/index.ts', // -> dist/index.js
  },
  format: ['esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  target: 'node20',

  // Shebang so dist/cli.js can run directly as the `docent` binary
  banner: {
    js: '#!/usr/bin/env node',
  },

  // Dependencies are installed from npm, never bundled
  external: [
    'ai',
    '@ai-sdk/anthropic',
    '@ai-sdk/openai',
    '@iarna/toml',
    'better-sqlite3',
    'chalk',
    'commander',
    'dotenv',
    'fast-glob',
    'ignore',
    'ora',
    'pdfjs-dist',
    'zod',
  ],
});
