/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 */

export {
  TIMEOUTS,
  PATHS,
  QUERY_DEFAULTS,
  FIRST_ENDPOINTS,
  EXIT_CODES,
  CONVERSION,
} from './defaults.js';
export { loadConfigFile } from './loader.js';
export { loadRunEnv, isTruthyFlag } from './env.js';
export type { RunEnv } from './env.js';
export { readManifest, parseManifest, packageNameOf, pinPackage } from './manifest.js';
export { ConfigError, ManifestError, StateListError, exitCodeOf, messageOf } from './errors.js';
