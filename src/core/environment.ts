import { mkdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

/** Fixed manifest written at the root of every freshly created environment. */
export const RUNTIME_PACKAGE = {
  name: 'first-reports-runtime',
  version: '0.0.0',
  private: true,
} as const;

/**
 * Remove `envDir` and everything in it, then create it again with only
 * the runtime `package.json`. The end state does not depend on what was there.
 */
export async function recreateEnvironment(envDir: string): Promise<void> {
  await rm(envDir, { recursive: true, force: true });
  await mkdir(envDir, { recursive: true });
  await writeFile(
    path.join(envDir, 'package.json'),
    JSON.stringify(RUNTIME_PACKAGE, null, 2) + '\n',
    'utf-8',
  );
}

/** Path of an executable installed into the environment's `node_modules/.bin`. */
export function environmentBin(envDir: string, name: string): string {
  return path.join(envDir, 'node_modules', '.bin', name);
}
