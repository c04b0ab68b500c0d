import { transformWithEsbuild, type Plugin } from 'vite';
import { defineConfig } from 'vitest/config';

// Vite's own esbuild step forces keepNames off, and esbuild then renames
// function expressions that shadow an outer binding (`function add` -> `add2`).
// Spans are named after functions, so transform TypeScript with names kept.
const KEEP_NAMES_HELPER =
  'var __defProp = Object.defineProperty;\n' +
  'var __name = (target, value) => __defProp(target, "name", { value, configurable: true });\n';
const KEEP_NAMES_HELPER_HOISTED =
  'function __name(target, value) {\n' +
  '  return Object.defineProperty(target, "name", { value, configurable: true });\n' +
  '}\n';

function esbuildKeepNames(): Plugin {
  return {
    name: 'esbuild-keep-names',
    async transform(code, id) {
      if (!/\.(m?ts|tsx)$/.test(id.split('?')[0]) || id.includes('/node_modules/')) return null;
      const result = await transformWithEsbuild(code, id, { target: 'esnext', keepNames: true });
      // vi.mock factories are hoisted above esbuild's `var __name` helper; make it a hoisted declaration
      const hoisted = result.code.replace(KEEP_NAMES_HELPER, KEEP_NAMES_HELPER_HOISTED);
      return { code: hoisted, map: JSON.stringify(result.map) };
    },
  };
}

export default defineConfig({
  esbuild: false,
  plugins: [esbuildKeepNames()],
  resolve: {
    // Load the same CommonJS build of the API that the OpenTelemetry SDK packages require
    alias: [{ find: /^@opentelemetry\/api$/, replacement: require.resolve('@opentelemetry/api') }],
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['tests/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/**/*.d.ts'],
    },
    testTimeout: 10000,
  },
});
