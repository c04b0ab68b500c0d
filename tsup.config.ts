import { readFileSync } from 'node:fs';
import { defineConfig } from 'tsup';

const pkg: { version: string } = JSON.parse(readFileSync('./package.json', 'utf8'));

export default defineConfig({
  entry: {
    // Core
    index: 'src/index.ts',
    // Framework integrations
    express: 'src/integrations/express.ts',
    lambda: 'src/integrations/lambda.ts',
    integrations: 'src/integrations/index.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  sourcemap: true,
  treeshake: true,
  splitting: false,
  target: 'node20',
  outDir: 'dist',
  platform: 'node',
  define: {
    __SDK_VERSION__: JSON.stringify(pkg.version),
  },
  banner: {
    js: '/* @beacontrace/sdk - session-aware tracing */',
  },
});
