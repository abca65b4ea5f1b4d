import { z } from 'zod';

import { PATHS, QUERY_DEFAULTS, TIMEOUTS } from '../config/defaults.js';

// ── Pipeline config file ────────────────────────────────────

export const pipelineConfigSchema = z
  .object({
    envDir: z.string().min(1).optional().default(PATHS.ENV_DIR),
    manifest: z.string().min(1).optional().default(PATHS.MANIFEST),
    stateList: z.string().min(1).optional().default(PATHS.STATE_LIST),
    scrapedDir: z.string().min(1).optional().default(PATHS.SCRAPED_DIR),
    outputDir: z.string().min(1).optional().default(PATHS.OUTPUT_DIR),
    firstYear: z.number().int().min(1975).optional().default(QUERY_DEFAULTS.FIRST_YEAR),
    lastYear: z.number().int().min(1975).optional().default(QUERY_DEFAULTS.LAST_YEAR),
    releaseLabel: z.string().min(1).optional().default(QUERY_DEFAULTS.RELEASE_LABEL),
    requestDelayMs: z
      .number()
      .int()
      .nonnegative()
      .optional()
      .default(TIMEOUTS.REQUEST_DELAY),
  })
  .strict()
  .refine((c) => c.firstYear <= c.lastYear, {
    message: 'firstYear must not be after lastYear',
    path: ['lastYear'],
  });

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
