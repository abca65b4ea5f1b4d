import { createRequire } from 'node:module';
import path from 'node:path';

import { z } from 'zod';

import type { CommandSpec, PipelineConfig, PipelineStep } from '../schema/index.js';
import { pinPackage, readManifest } from '../config/manifest.js';
import { environmentBin, recreateEnvironment } from './environment.js';

// ── Public types ─────────────────────────────────────────────

/** How to start this CLI again as a child process. */
export interface CliInvocation {
  execPath: string;
  execArgv: readonly string[];
  entry: string;
}

export interface RunPlanInput {
  config: PipelineConfig;
  /** Directory that relative config paths resolve against. */
  rootDir: string;
  configPath: string;
  showBrowser: boolean;
  cli: CliInvocation;
  baseEnv: NodeJS.ProcessEnv;
  /**
   * Playwright version the fetcher loads. The environment installs exactly
   * this version so the browser build it downloads is the one launched.
   */
  playwrightVersion: string;
}

export const STEP_IDS = {
  CREATE_ENVIRONMENT: 'create-environment',
  UPGRADE_INSTALLER: 'upgrade-installer',
  INSTALL_DEPENDENCIES: 'install-dependencies',
  INSTALL_BROWSERS: 'install-browsers',
  FETCH_REPORTS: 'fetch-reports',
  CONVERT_REPORTS: 'convert-reports',
} as const;

const NPM_FLAGS = ['--no-audit', '--no-fund'] as const;

// ── Invocation of the running CLI ───────────────────────────

export function currentCliInvocation(): CliInvocation {
  const entry = process.argv[1];
  if (entry === undefined) {
    throw new Error('Cannot determine the CLI entry point from process.argv');
  }
  return {
    execPath: process.execPath,
    execArgv: process.execArgv,
    entry,
  };
}

/** Version of the `playwright` package this CLI resolves at run time. */
export function resolvedPlaywrightVersion(): string {
  const load = createRequire(import.meta.url);
  return z.object({ version: z.string().min(1) }).parse(load('playwright/package.json')).version;
}

// ── Child environment ───────────────────────────────────────

/**
 * Environment for the Report Fetcher: `SHOW_BROWSER=1` when the toggle
 * is on, and no `SHOW_BROWSER` at all when it is off.
 */
export function fetcherEnv(
  baseEnv: NodeJS.ProcessEnv,
  showBrowser: boolean,
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...baseEnv };
  if (showBrowser) {
    env['SHOW_BROWSER'] = '1';
  } else {
    delete env['SHOW_BROWSER'];
  }
  return env;
}

// ── Plan builder ────────────────────────────────────────────

/** The fixed, ordered list of steps behind `first-reports run`. */
export function buildRunPlan(input: RunPlanInput): PipelineStep[] {
  const { config, rootDir, cli, baseEnv } = input;
  const envDir = path.resolve(rootDir, config.envDir);
  const manifestPath = path.resolve(rootDir, config.manifest);

  const selfCommand = (subcommand: 'fetch' | 'convert', env: NodeJS.ProcessEnv): CommandSpec => ({
    command: cli.execPath,
    args: [...cli.execArgv, cli.entry, subcommand, '--config', input.configPath],
    env,
    cwd: rootDir,
  });

  return [
    {
      id: STEP_IDS.CREATE_ENVIRONMENT,
      title: `Create runtime environment (${config.envDir})`,
      fatal: true,
      kind: 'action',
      run: () => recreateEnvironment(envDir),
    },
    {
      id: STEP_IDS.UPGRADE_INSTALLER,
      title: 'Upgrade npm inside the environment',
      fatal: true,
      kind: 'command',
      command: {
        command: 'npm',
        args: ['install', '--prefix', envDir, ...NPM_FLAGS, 'npm@latest'],
        env: baseEnv,
        cwd: rootDir,
      },
    },
    {
      id: STEP_IDS.INSTALL_DEPENDENCIES,
      title: `Install dependencies from ${config.manifest}`,
      fatal: true,
      kind: 'command',
      command: async () => {
        const listed = await readManifest(manifestPath);
        const specs = pinPackage(listed, 'playwright', input.playwrightVersion);
        return {
          command: environmentBin(envDir, 'npm'),
          args: ['install', '--prefix', envDir, ...NPM_FLAGS, ...specs],
          env: baseEnv,
          cwd: rootDir,
        };
      },
    },
    {
      id: STEP_IDS.INSTALL_BROWSERS,
      title: 'Install Playwright browsers (no-op if already installed)',
      fatal: false,
      kind: 'command',
      command: {
        command: environmentBin(envDir, 'playwright'),
        args: ['install', '--with-deps', 'chromium'],
        env: baseEnv,
        cwd: rootDir,
      },
    },
    {
      id: STEP_IDS.FETCH_REPORTS,
      title: input.showBrowser
        ? 'Fetch FIRST reports (visible browser)'
        : 'Fetch FIRST reports (headless)',
      fatal: true,
      kind: 'command',
      command: selfCommand('fetch', fetcherEnv(baseEnv, input.showBrowser)),
    },
    {
      id: STEP_IDS.CONVERT_REPORTS,
      title: 'Convert downloaded .xlsx files to simplified CSVs',
      fatal: true,
      kind: 'command',
      command: selfCommand('convert', baseEnv),
    },
  ];
}
