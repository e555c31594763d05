import { defineConfig } from 'tsup';

export default defineConfig({
  entry: [
    'src/index.ts',   // @pushgate/core - git, inspector, recorder, config, logger
  ],
  format: ['cjs'],
  dts: true,
  sourcemap: true,
  clean: true,
  outDir: 'dist',
  splitting: false,
  treeshake: true,
  external: ['ajv', 'js-yaml'],
});
