/**
 * Core orchestration module.
 * The run sequencer and its plan, plus the fetch and convert loops
 * the sequencer starts as child processes.
 */

export { runSequence } from './sequencer.js';
export {
  buildRunPlan,
  currentCliInvocation,
  fetcherEnv,
  resolvedPlaywrightVersion,
  STEP_IDS,
} from './plan.js';
export type { CliInvocation, RunPlanInput } from './plan.js';
export { recreateEnvironment, environmentBin, RUNTIME_PACKAGE } from './environment.js';
export { fetchReports, loadStateList } from './fetchReports.js';
export type { FetchConfig, FetchDeps } from './fetchReports.js';
export { convertReports, convertWorkbook, listWorkbooks } from './convertReports.js';
export type { ConvertConfig } from './convertReports.js';
