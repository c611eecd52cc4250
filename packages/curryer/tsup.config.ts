import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Main entry point (curry, named, method + Curryer namespace)
    index: 'src/index.ts',

    // =========================================================================
    // Granular entry points
    // =========================================================================
    errors: 'src/errors-entry.ts',
    result: 'src/result.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
});
