import { spawn } from 'node:child_process';
import { constants } from 'node:os';

import type { CommandSpec } from '../schema/index.js';
import { EXIT_CODES } from '../config/defaults.js';
import * as log from '../utils/logger.js';

// ── Public interface ─────────────────────────────────────────

export interface ProcessRunner {
  /** Run a command to completion and resolve with its exit code. */
  run(spec: CommandSpec): Promise<number>;
}

// ── Exit code mapping ────────────────────────────────────────

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

export function exitCodeFor(
  code: number | null,
  signal: NodeJS.Signals | null,
): number {
  if (code !== null) return code;
  if (signal !== null) {
    return EXIT_CODES.SIGNAL_BASE + (SIGNAL_NUMBERS.get(signal) ?? 0);
  }
  return EXIT_CODES.FAILURE;
}

// ── Spawn-backed runner ──────────────────────────────────────

/**
 * Runs each command as a child process with inherited stdio.
 * A command that cannot be started resolves with 127.
 */
export function createSpawnRunner(): ProcessRunner {
  return {
    run(spec: CommandSpec): Promise<number> {
      log.command(spec.command, spec.args);

      return new Promise<number>((resolve) => {
        let settled = false;
        const settle = (exitCode: number): void => {
          if (settled) return;
          settled = true;
          resolve(exitCode);
        };

        const child = spawn(spec.command, [...spec.args], {
          cwd: spec.cwd ?? process.cwd(),
          env: spec.env ?? process.env,
          stdio: 'inherit',
        });

        child.on('error', (err) => {
          log.error(`Could not start ${spec.command}: ${err.message}`);
          settle(EXIT_CODES.SPAWN_FAILURE);
        });

        child.on('close', (code, signal) => {
          settle(exitCodeFor(code, signal));
        });
      });
    },
  };
}
