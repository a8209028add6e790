import { defineConfig } from 'tsup';
import { readFileSync } from 'fs';
import { join } from 'path';

interface PackageManifest {
  dependencies?: Record<string, string>;
  peerDependencies?: Record<string, string>;
  devDependencies?: Record<string, string>;
}

const packageJson: PackageManifest = JSON.parse(
  readFileSync(join(process.cwd(), 'package.json'), 'utf-8'),
);

// Everything listed in package.json stays external, dev dependencies included
const getAllDependencies = (): string[] => {
  const deps = new Set<string>();

  for (const group of [
    packageJson.dependencies,
    packageJson.peerDependencies,
    packageJson.devDependencies,
  ]) {
    for (const dep of Object.keys(group ?? {})) {
      deps.add(dep);
    }
  }

  return Array.from(deps).sort();
};

export default defineConfig({
  entry: ['src/index.ts'],
  outDir: 'dist',
  format: ['esm'],
  dts: true,
  splitting: false,
  sourcemap: true,
  clean: true,
  external: getAllDependencies(),
});
