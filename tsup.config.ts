import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Main entry point (builders, end-points, clocks, Timeshift namespace)
    index: 'src/index.ts',

    // =========================================================================
    // Granular entry points
    // =========================================================================
    duration: 'src/duration-entry.ts',
    errors: 'src/errors-entry.ts',
    result: 'src/result.ts',

    // =========================================================================
    // Tools
    // =========================================================================
    testing: 'src/testing-entry.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
});
