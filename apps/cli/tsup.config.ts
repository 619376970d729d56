import { defineConfig } from 'tsup';
import { readFileSync } from 'fs';
import { cp } from 'fs/promises';

// Read package.json version at build time
const packageJson: unknown = JSON.parse(readFileSync('./package.json', 'utf-8'));
const version =
  typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
    ? String(packageJson.version)
    : '0.0.0';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: false,
  clean: true,
  target: 'node20',
  platform: 'node',
  treeshake: true,
  splitting: false,
  sourcemap: true,
  minify: false,
  // The core package ships TypeScript sources, so it is bundled in
  noExternal: ['@retrace/core'],
  define: {
    __CLI_VERSION__: JSON.stringify(version),
  },
  // The runtime guard template is read from disk next to the bundle
  onSuccess: async () => {
    await cp('../../packages/core/templates', './dist/templates', { recursive: true });
  },
});
