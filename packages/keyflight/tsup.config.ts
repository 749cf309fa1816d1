import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Main entry point (everything)
    index: 'src/index.ts',

    // =========================================================================
    // Granular entry points
    // =========================================================================
    core: 'src/core-entry.ts',
    singleflight: 'src/singleflight-entry.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
});
