import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    'cli/index': 'src/cli/index.ts',
  },
  format: ['esm'],
  sourcemap: true,
  clean: true,
  target: 'node20',
  banner: {
    // Shebang for the CLI entry point
    js: '#!/usr/bin/env node',
  },
});
