/**
 * CLI module — thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export { registerRunCommand, registerFetchCommand, registerConvertCommand } from './run.js';
