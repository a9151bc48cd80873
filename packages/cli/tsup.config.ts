import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  sourcemap: true,
  clean: true,
  target: 'es2022',
  platform: 'node',
  noExternal: [/^@parley\//],
  banner: { js: '#!/usr/bin/env node' },
  onSuccess: 'cp src/system-instruction.md dist/system-instruction.md',
});
