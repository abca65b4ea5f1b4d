import { readFile } from 'node:fs/promises';

import { ManifestError, messageOf } from './errors.js';

/**
 * Read a dependency manifest: one npm package spec per line.
 * Blank lines and `#` comments are ignored.
 */
export async function readManifest(manifestPath: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await readFile(manifestPath, 'utf-8');
  } catch (err) {
    throw new ManifestError(`Cannot read dependency manifest ${manifestPath}: ${messageOf(err)}`);
  }

  const specs = parseManifest(raw);
  if (specs.length === 0) {
    throw new ManifestError(`Dependency manifest is empty: ${manifestPath}`);
  }
  return specs;
}

export function parseManifest(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) => {
      const hash = line.indexOf('#');
      return (hash === -1 ? line : line.slice(0, hash)).trim();
    })
    .filter((line) => line.length > 0);
}

/** Package name of an npm spec: `playwright@^1.47.2` → `playwright`. */
export function packageNameOf(spec: string): string {
  const at = spec.indexOf('@', spec.startsWith('@') ? 1 : 0);
  return at === -1 ? spec : spec.slice(0, at);
}

/**
 * Replace every spec for `name` with `name@version`, appending one when
 * the manifest does not list the package.
 */
export function pinPackage(specs: readonly string[], name: string, version: string): string[] {
  const pinned = `${name}@${version}`;
  const rest = specs.filter((spec) => packageNameOf(spec) !== name);
  const index = specs.findIndex((spec) => packageNameOf(spec) === name);
  if (index === -1) return [...rest, pinned];
  return [...rest.slice(0, index), pinned, ...rest.slice(index)];
}
