/**
 * Process module.
 * The only place child processes are started.
 */

export { createSpawnRunner, exitCodeFor } from './runner.js';
export type { ProcessRunner } from './runner.js';
