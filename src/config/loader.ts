import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import { pipelineConfigSchema } from '../schema/config.js';
import type { PipelineConfig } from '../schema/config.js';
import { ConfigError, messageOf } from './errors.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.first-reports.yaml` (or JSON) config file.
 * A missing file yields the defaults; an invalid one throws `ConfigError`.
 */
export async function loadConfigFile(configPath: string): Promise<PipelineConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return pipelineConfigSchema.parse({});
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = configPath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    throw new ConfigError(`${configPath}: ${messageOf(err)}`);
  }

  try {
    return pipelineConfigSchema.parse(parsed ?? {});
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      throw new ConfigError(`${configPath}: ${issues}`);
    }
    throw err;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
