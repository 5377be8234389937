import { defineConfig } from 'tsup';

export default defineConfig({
  outDir: 'bundle',
  entry: {
    index: 'src/index.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  splitting: false,
  sourcemap: true,
  clean: true,
  treeshake: true,
  minify: false,
  target: 'es2022',
  external: ['js-tiktoken'],
});
