import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['apps/cli/src/index.ts'],
  outDir: 'apps/cli/dist',
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  clean: true,
  // Bundle the @tunnelbot/* workspace packages so the binary is
  // self-contained; they have no runtime dependencies of their own.
  noExternal: [/^@tunnelbot\//],
});
