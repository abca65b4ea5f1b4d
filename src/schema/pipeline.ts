import { z } from 'zod';

// ── Commands ────────────────────────────────────────────────

export interface CommandSpec {
  command: string;
  args: readonly string[];
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

// ── Steps ───────────────────────────────────────────────────

interface BaseStep {
  id: string;
  title: string;
  /** A fatal step that exits non-zero stops the run. */
  fatal: boolean;
}

export interface ActionStep extends BaseStep {
  kind: 'action';
  run(): Promise<void>;
}

export interface CommandStep extends BaseStep {
  kind: 'command';
  /** Either a ready spec, or a function that prepares one when the step starts. */
  command: CommandSpec | (() => Promise<CommandSpec>);
}

export type PipelineStep = ActionStep | CommandStep;

// ── Outcomes ────────────────────────────────────────────────

export const stepStatusSchema = z.enum(['passed', 'failed', 'tolerated', 'skipped']);

export type StepStatus = z.infer<typeof stepStatusSchema>;

export const stepOutcomeSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  fatal: z.boolean(),
  status: stepStatusSchema,
  exitCode: z.number().int().nullable(),
  durationMs: z.number().int().nonnegative(),
});

export type StepOutcome = z.infer<typeof stepOutcomeSchema>;

export const runSummarySchema = z.object({
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
  exitCode: z.number().int().nonnegative(),
  steps: z.array(stepOutcomeSchema),
});

export type RunSummary = z.infer<typeof runSummarySchema>;

/** The step that ended the run, if any. */
export function findAbortingStep(summary: RunSummary): StepOutcome | undefined {
  return summary.steps.find((s) => s.status === 'failed');
}
