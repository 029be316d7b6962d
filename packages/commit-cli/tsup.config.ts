import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  clean: true,
  sourcemap: true,
  // Workspace packages point at TypeScript sources, so the binary bundles them
  noExternal: ['@discovery-autocommit/commit-core', '@discovery-autocommit/commit-contracts'],
  // pino loads pino-pretty by name in a worker thread, so it must stay external
  external: ['pino', 'pino-pretty', 'simple-git', 'minimatch', 'zod'],
});
