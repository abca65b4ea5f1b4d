import { z } from 'zod';

// ── Runtime environment ─────────────────────────────────────

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

export const runEnvSchema = z.object({
  SHOW_BROWSER: z.string().optional(),
});

export interface RunEnv {
  /** Run the Report Fetcher with a visible browser window. */
  showBrowser: boolean;
}

export function isTruthyFlag(value: string | undefined): boolean {
  return value !== undefined && TRUTHY.has(value.trim().toLowerCase());
}

export function loadRunEnv(env: NodeJS.ProcessEnv = process.env): RunEnv {
  const parsed = runEnvSchema.parse(env);
  return { showBrowser: isTruthyFlag(parsed.SHOW_BROWSER) };
}
