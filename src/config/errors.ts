import { EXIT_CODES } from './defaults.js';

// ── Errors carrying the process exit code ───────────────────

export class ConfigError extends Error {
  readonly exitCode = EXIT_CODES.CONFIG_ERROR;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ManifestError extends Error {
  readonly exitCode = EXIT_CODES.FAILURE;

  constructor(message: string) {
    super(message);
    this.name = 'ManifestError';
  }
}

export class StateListError extends Error {
  readonly exitCode = EXIT_CODES.FAILURE;

  constructor(message: string) {
    super(message);
    this.name = 'StateListError';
  }
}

export function exitCodeOf(err: unknown): number {
  if (
    err instanceof ConfigError ||
    err instanceof ManifestError ||
    err instanceof StateListError
  ) {
    return err.exitCode;
  }
  return EXIT_CODES.FAILURE;
}

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
