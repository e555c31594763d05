import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['cjs'],
  sourcemap: true,
  clean: true,
  outDir: 'dist',
  splitting: false,
  external: ['@pushgate/core', 'commander'],
});
