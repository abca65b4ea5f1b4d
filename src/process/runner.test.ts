import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createSpawnRunner, exitCodeFor } from './runner.js';

describe('createSpawnRunner', () => {
  beforeEach(() => {
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('resolves with the child exit code', async () => {
    const code = await createSpawnRunner().run({
      command: process.execPath,
      args: ['-e', 'process.exit(3)'],
    });

    expect(code).toBe(3);
  });

  it('passes the given environment to the child', async () => {
    const code = await createSpawnRunner().run({
      command: process.execPath,
      args: ['-e', "process.exit(process.env.SHOW_BROWSER === '1' ? 0 : 5)"],
      env: { ...process.env, SHOW_BROWSER: '1' },
    });

    expect(code).toBe(0);
  });

  it('resolves with 127 when the command cannot be started', async () => {
    const code = await createSpawnRunner().run({
      command: '/nonexistent/first-reports-missing-binary',
      args: [],
    });

    expect(code).toBe(127);
  });
});

describe('exitCodeFor', () => {
  it('keeps a numeric exit code', () => {
    expect(exitCodeFor(2, null)).toBe(2);
    expect(exitCodeFor(0, null)).toBe(0);
  });

  it('maps a terminating signal to 128 + its number', () => {
    expect(exitCodeFor(null, 'SIGTERM')).toBe(143);
    expect(exitCodeFor(null, 'SIGINT')).toBe(130);
  });

  it('falls back to 1 without code or signal', () => {
    expect(exitCodeFor(null, null)).toBe(1);
  });
});
