import { defineConfig } from 'tsup';

export default defineConfig([
  {
    entry: {
      index: 'src/index.ts',
      // Loaded by generated runner programs, so it must exist on its own.
      request: 'src/request.ts',
      // Light import for logic units that only need notFound().
      errors: 'src/errors.ts',
    },
    format: ['esm'],
    dts: true,
    outDir: 'dist',
    clean: true,
    external: ['esbuild', 'handlebars', 'p-limit', 'ws'],
  },
  {
    entry: {
      cli: 'src/cli.ts',
    },
    format: ['esm'],
    dts: false,
    outDir: 'dist',
    clean: false,
    banner: {
      js: '#!/usr/bin/env node',
    },
    external: ['esbuild', 'handlebars', 'p-limit', 'ws'],
  },
]);
