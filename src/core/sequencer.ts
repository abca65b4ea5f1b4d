import type {
  CommandSpec,
  PipelineStep,
  RunSummary,
  StepStatus,
  StepOutcome,
} from '../schema/index.js';
import { EXIT_CODES } from '../config/defaults.js';
import { messageOf } from '../config/errors.js';
import type { ProcessRunner } from '../process/index.js';
import * as log from '../utils/logger.js';

// ── Single step ──────────────────────────────────────────────

async function resolveCommand(
  command: CommandSpec | (() => Promise<CommandSpec>),
): Promise<CommandSpec> {
  return typeof command === 'function' ? command() : command;
}

async function executeStep(
  step: PipelineStep,
  runner: ProcessRunner,
): Promise<number> {
  if (step.kind === 'action') {
    try {
      await step.run();
      return EXIT_CODES.SUCCESS;
    } catch (err) {
      log.error(`${step.title}: ${messageOf(err)}`);
      return EXIT_CODES.FAILURE;
    }
  }

  let spec: CommandSpec;
  try {
    spec = await resolveCommand(step.command);
  } catch (err) {
    log.error(`${step.title}: ${messageOf(err)}`);
    return EXIT_CODES.FAILURE;
  }
  return runner.run(spec);
}

// ── Sequence ────────────────────────────────────────────────

/**
 * Run `plan` in order. The first fatal step with a non-zero exit code
 * ends the run; every later step is recorded as skipped and never started.
 * A non-fatal failure is logged and the run continues.
 */
export async function runSequence(
  plan: readonly PipelineStep[],
  runner: ProcessRunner,
): Promise<RunSummary> {
  const startedAt = new Date();
  const steps: StepOutcome[] = [];
  let exitCode: number = EXIT_CODES.SUCCESS;
  let aborted = false;

  for (const [index, step] of plan.entries()) {
    const base = { id: step.id, title: step.title, fatal: step.fatal };

    if (aborted) {
      steps.push({ ...base, status: 'skipped', exitCode: null, durationMs: 0 });
      continue;
    }

    log.stepStarted(index, plan.length, step.title);
    const stepStart = Date.now();
    const code = await executeStep(step, runner);
    const durationMs = Date.now() - stepStart;

    const status: StepStatus =
      code === EXIT_CODES.SUCCESS ? 'passed' : step.fatal ? 'failed' : 'tolerated';
    log.stepFinished(index, plan.length, status, step.title, code);
    steps.push({ ...base, status, exitCode: code, durationMs });
    if (status === 'failed') {
      exitCode = code;
      aborted = true;
    }
  }

  const finishedAt = new Date();
  return {
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
    exitCode,
    steps,
  };
}
