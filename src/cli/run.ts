import path from 'node:path';

import type { Command } from 'commander';

import type { ConversionOutcome, FetchOutcome, PipelineConfig, RunSummary } from '../schema/index.js';
import { findAbortingStep, tally } from '../schema/index.js';
import {
  PATHS,
  exitCodeOf,
  loadConfigFile,
  loadRunEnv,
  messageOf,
} from '../config/index.js';
import {
  buildRunPlan,
  convertReports,
  currentCliInvocation,
  fetchReports,
  resolvedPlaywrightVersion,
  runSequence,
} from '../core/index.js';
import { createSpawnRunner } from '../process/index.js';
import * as log from '../utils/logger.js';

// ── Shared helpers ───────────────────────────────────────────

interface ConfigOption {
  config: string;
}

function resolvePath(config: PipelineConfig, key: 'stateList' | 'scrapedDir' | 'outputDir'): string {
  return path.resolve(config[key]);
}

function fail(err: unknown): void {
  log.error(`Error: ${messageOf(err)}`);
  process.exitCode = exitCodeOf(err);
}

function formatCounts(counts: Partial<Record<string, number>>): string {
  const parts = Object.entries(counts).map(([status, n]) => `${String(n)} ${status}`);
  return parts.length > 0 ? parts.join(', ') : 'nothing to do';
}

// ── Summaries ────────────────────────────────────────────────

function printRunSummary(summary: RunSummary, config: PipelineConfig, showBrowser: boolean): void {
  log.heading('Run summary');
  for (const step of summary.steps) {
    const code = step.exitCode === null ? '-' : String(step.exitCode);
    log.detail(`${step.status.padEnd(9)} ${step.id.padEnd(22)} exit ${code}`);
  }
  log.detail(`Time: ${(summary.durationMs / 1000).toFixed(1)}s`);

  const aborting = findAbortingStep(summary);
  if (aborting !== undefined) {
    log.error(`Run stopped at "${aborting.title}" (exit ${String(summary.exitCode)})`);
    return;
  }

  if (!showBrowser) {
    log.info('To watch the browser while fetching, run again with SHOW_BROWSER=1');
  }
  log.info(`Done. Output CSVs are in ${resolvePath(config, 'outputDir')}`);
}

function printFetchSummary(outcomes: readonly FetchOutcome[]): void {
  log.heading('Fetch summary');
  log.detail(formatCounts(tally(outcomes)));
}

function printConvertSummary(outcomes: readonly ConversionOutcome[]): void {
  log.heading('Convert summary');
  log.detail(formatCounts(tally(outcomes)));
}

// ── Run command (the whole pipeline) ─────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Provision the runtime environment, fetch every report, then convert them')
    .option('--config <path>', 'Path to config file', PATHS.CONFIG_FILE)
    .action(async (opts: ConfigOption) => {
      try {
        const config = await loadConfigFile(opts.config);
        const { showBrowser } = loadRunEnv();

        const plan = buildRunPlan({
          config,
          rootDir: process.cwd(),
          configPath: path.resolve(opts.config),
          showBrowser,
          cli: currentCliInvocation(),
          baseEnv: process.env,
          playwrightVersion: resolvedPlaywrightVersion(),
        });

        const summary = await runSequence(plan, createSpawnRunner());
        printRunSummary(summary, config, showBrowser);
        process.exitCode = summary.exitCode;
      } catch (err) {
        fail(err);
      }
    });
}

// ── Fetch command (Report Fetcher) ───────────────────────────

export function registerFetchCommand(program: Command): void {
  program
    .command('fetch')
    .description('Download the FIRST crash report workbook of every listed state')
    .option('--config <path>', 'Path to config file', PATHS.CONFIG_FILE)
    .option('--show-browser', 'Run with a visible browser window (same as SHOW_BROWSER=1)')
    .action(async (opts: ConfigOption & { showBrowser?: true }) => {
      try {
        const config = await loadConfigFile(opts.config);
        const showBrowser = opts.showBrowser ?? loadRunEnv().showBrowser;

        const outcomes = await fetchReports({
          stateListPath: resolvePath(config, 'stateList'),
          scrapedDir: resolvePath(config, 'scrapedDir'),
          headless: !showBrowser,
          query: {
            firstYear: config.firstYear,
            lastYear: config.lastYear,
            releaseLabel: config.releaseLabel,
          },
          requestDelayMs: config.requestDelayMs,
        });
        printFetchSummary(outcomes);
      } catch (err) {
        fail(err);
      }
    });
}

// ── Convert command (Format Converter) ──────────────────────

export function registerConvertCommand(program: Command): void {
  program
    .command('convert')
    .description('Convert downloaded .xlsx reports into simplified CSV tables')
    .option('--config <path>', 'Path to config file', PATHS.CONFIG_FILE)
    .action(async (opts: ConfigOption) => {
      try {
        const config = await loadConfigFile(opts.config);
        const outcomes = await convertReports({
          scrapedDir: resolvePath(config, 'scrapedDir'),
          outputDir: resolvePath(config, 'outputDir'),
        });
        printConvertSummary(outcomes);
      } catch (err) {
        fail(err);
      }
    });
}
