import { mkdir, readFile } from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';

import type { FetchOutcome, ReportState } from '../schema/index.js';
import { stateListSchema, toReportState } from '../schema/index.js';
import { StateListError, messageOf } from '../config/errors.js';
import { fetchStateReport, launchReportSession } from '../browser/index.js';
import type { DownloadOptions, ReportQuery, ReportSession, SessionConfig } from '../browser/index.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface FetchConfig {
  stateListPath: string;
  scrapedDir: string;
  headless: boolean;
  query: ReportQuery;
  requestDelayMs: number;
}

export interface FetchDeps {
  openSession: (config: SessionConfig) => Promise<ReportSession>;
  fetchState: (
    session: ReportSession,
    state: ReportState,
    options: DownloadOptions,
  ) => Promise<FetchOutcome>;
  delay: (ms: number) => Promise<void>;
}

const defaultDeps: FetchDeps = {
  openSession: launchReportSession,
  fetchState: fetchStateReport,
  delay: async (ms) => {
    await sleep(ms);
  },
};

// ── State list ──────────────────────────────────────────────

export async function loadStateList(stateListPath: string): Promise<ReportState[]> {
  let text: string;
  try {
    text = await readFile(stateListPath, 'utf-8');
  } catch (err) {
    throw new StateListError(`State file not found: ${stateListPath} (${messageOf(err)})`);
  }
  if (text.trim().length === 0) {
    throw new StateListError(`State file is empty: ${stateListPath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new StateListError(`State file is not valid JSON: ${stateListPath} (${messageOf(err)})`);
  }

  const result = stateListSchema.safeParse(parsed);
  if (!result.success) {
    throw new StateListError(`State file has an invalid shape: ${stateListPath}`);
  }
  return result.data.map(toReportState);
}

// ── Fetch loop ──────────────────────────────────────────────

/**
 * Download the report of every state in the list, one at a time.
 * A failing state is recorded and the loop moves on.
 */
export async function fetchReports(
  config: FetchConfig,
  deps: FetchDeps = defaultDeps,
): Promise<FetchOutcome[]> {
  await mkdir(config.scrapedDir, { recursive: true });
  const states = await loadStateList(config.stateListPath);
  log.info(`Loaded ${String(states.length)} states from ${config.stateListPath}`);

  const session = await deps.openSession({ headless: config.headless });
  const outcomes: FetchOutcome[] = [];
  const options: DownloadOptions = { scrapedDir: config.scrapedDir, query: config.query };

  try {
    for (const [index, state] of states.entries()) {
      log.stateStarted(index, states.length, state.id, state.name);
      try {
        outcomes.push(await deps.fetchState(session, state, options));
      } catch (err) {
        const message = messageOf(err);
        log.error(`Error for ${state.name}: ${message}`);
        outcomes.push({ state: state.name, status: 'error', message });
      }
      if (index < states.length - 1) {
        await deps.delay(config.requestDelayMs);
      }
    }
  } finally {
    await session.close();
  }

  return outcomes;
}
