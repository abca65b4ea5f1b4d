import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { environmentBin, recreateEnvironment, RUNTIME_PACKAGE } from './environment.js';

describe('recreateEnvironment', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'first-reports-env-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('creates the directory with only the runtime package.json', async () => {
    const envDir = path.join(root, '.runtime');

    await recreateEnvironment(envDir);

    expect(await readdir(envDir)).toEqual(['package.json']);
    const pkg: unknown = JSON.parse(await readFile(path.join(envDir, 'package.json'), 'utf-8'));
    expect(pkg).toEqual(RUNTIME_PACKAGE);
  });

  it('ends in the same state when run twice', async () => {
    const envDir = path.join(root, '.runtime');

    await recreateEnvironment(envDir);
    const first = await readFile(path.join(envDir, 'package.json'), 'utf-8');

    await mkdir(path.join(envDir, 'node_modules', 'left-over'), { recursive: true });
    await writeFile(path.join(envDir, 'stale.txt'), 'from an earlier run');
    await recreateEnvironment(envDir);

    expect(await readdir(envDir)).toEqual(['package.json']);
    expect(await readFile(path.join(envDir, 'package.json'), 'utf-8')).toBe(first);
  });
});

describe('environmentBin', () => {
  it('points into node_modules/.bin', () => {
    expect(environmentBin('/work/.runtime', 'npm')).toBe(
      path.join('/work/.runtime', 'node_modules', '.bin', 'npm'),
    );
  });
});
