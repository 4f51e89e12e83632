import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  sourcemap: true,
  clean: true,
  target: 'node20',
  banner: { js: '#!/usr/bin/env node' },
  // @baton/core ships TypeScript sources; bundle it, keep the native add-on external.
  noExternal: ['@baton/core'],
  external: ['better-sqlite3'],
});
