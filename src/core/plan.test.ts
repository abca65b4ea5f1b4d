import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { CommandSpec, CommandStep, PipelineConfig, PipelineStep } from '../schema/index.js';
import { pipelineConfigSchema } from '../schema/index.js';
import type { ProcessRunner } from '../process/index.js';
import type { CliInvocation } from './plan.js';
import { buildRunPlan, fetcherEnv, resolvedPlaywrightVersion, STEP_IDS } from './plan.js';
import { runSequence } from './sequencer.js';

const cli: CliInvocation = {
  execPath: '/usr/bin/node',
  execArgv: ['--enable-source-maps'],
  entry: '/opt/first-reports/dist/cli/main.js',
};

function commandStep(plan: readonly PipelineStep[], id: string): CommandStep {
  const step = plan.find((s) => s.id === id);
  if (step === undefined || step.kind !== 'command') {
    throw new Error(`no command step ${id}`);
  }
  return step;
}

async function specOf(step: CommandStep): Promise<CommandSpec> {
  return typeof step.command === 'function' ? step.command() : step.command;
}

describe('buildRunPlan', () => {
  let root: string;
  let config: PipelineConfig;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'first-reports-plan-'));
    config = pipelineConfigSchema.parse({});
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  function plan(showBrowser: boolean, baseEnv: NodeJS.ProcessEnv = {}): PipelineStep[] {
    return buildRunPlan({
      config,
      rootDir: root,
      configPath: path.join(root, '.first-reports.yaml'),
      showBrowser,
      cli,
      baseEnv,
      playwrightVersion: '1.48.0',
    });
  }

  it('lists the six steps in order with only the browser install tolerated', () => {
    const steps = plan(false);

    expect(steps.map((s) => s.id)).toEqual([
      STEP_IDS.CREATE_ENVIRONMENT,
      STEP_IDS.UPGRADE_INSTALLER,
      STEP_IDS.INSTALL_DEPENDENCIES,
      STEP_IDS.INSTALL_BROWSERS,
      STEP_IDS.FETCH_REPORTS,
      STEP_IDS.CONVERT_REPORTS,
    ]);
    expect(steps.map((s) => s.fatal)).toEqual([true, true, true, false, true, true]);
  });

  it('upgrades npm into the environment prefix', async () => {
    const spec = await specOf(commandStep(plan(false), STEP_IDS.UPGRADE_INSTALLER));

    expect(spec.command).toBe('npm');
    expect(spec.args).toEqual([
      'install',
      '--prefix',
      path.join(root, '.runtime'),
      '--no-audit',
      '--no-fund',
      'npm@latest',
    ]);
  });

  it('installs the manifest packages with the environment npm, playwright pinned', async () => {
    await writeFile(
      path.join(root, 'runtime-packages.txt'),
      '# runtime\nplaywright@^1.47.2\ncheerio\n',
    );

    const spec = await specOf(commandStep(plan(false), STEP_IDS.INSTALL_DEPENDENCIES));

    expect(spec.command).toBe(path.join(root, '.runtime', 'node_modules', '.bin', 'npm'));
    expect(spec.args).toEqual([
      'install',
      '--prefix',
      path.join(root, '.runtime'),
      '--no-audit',
      '--no-fund',
      'playwright@1.48.0',
      'cheerio',
    ]);
  });

  it('adds playwright to the install when the manifest leaves it out', async () => {
    await writeFile(path.join(root, 'runtime-packages.txt'), 'cheerio\n');

    const spec = await specOf(commandStep(plan(false), STEP_IDS.INSTALL_DEPENDENCIES));

    expect(spec.args.slice(-2)).toEqual(['cheerio', 'playwright@1.48.0']);
  });

  it('installs browsers for the same playwright release the fetcher imports', async () => {
    await writeFile(path.join(root, 'runtime-packages.txt'), 'playwright@^1.0.0\n');
    const installed: unknown = JSON.parse(
      await readFile(path.resolve('node_modules', 'playwright', 'package.json'), 'utf-8'),
    );
    const steps = buildRunPlan({
      config,
      rootDir: root,
      configPath: path.join(root, '.first-reports.yaml'),
      showBrowser: false,
      cli,
      baseEnv: {},
      playwrightVersion: resolvedPlaywrightVersion(),
    });

    const deps = await specOf(commandStep(steps, STEP_IDS.INSTALL_DEPENDENCIES));
    const browsers = await specOf(commandStep(steps, STEP_IDS.INSTALL_BROWSERS));

    expect(installed).toMatchObject({ version: resolvedPlaywrightVersion() });
    expect(deps.args).toContain(`playwright@${resolvedPlaywrightVersion()}`);
    expect(deps.args).not.toContain('playwright@^1.0.0');
    expect(browsers.command).toBe(path.join(root, '.runtime', 'node_modules', '.bin', 'playwright'));
  });

  it('starts the fetcher and converter as this CLI', async () => {
    const steps = plan(false);
    const fetch = await specOf(commandStep(steps, STEP_IDS.FETCH_REPORTS));
    const convert = await specOf(commandStep(steps, STEP_IDS.CONVERT_REPORTS));
    const configPath = path.join(root, '.first-reports.yaml');

    expect(fetch.command).toBe('/usr/bin/node');
    expect(fetch.args).toEqual([
      '--enable-source-maps',
      '/opt/first-reports/dist/cli/main.js',
      'fetch',
      '--config',
      configPath,
    ]);
    expect(convert.args).toEqual([
      '--enable-source-maps',
      '/opt/first-reports/dist/cli/main.js',
      'convert',
      '--config',
      configPath,
    ]);
    expect(fetch.cwd).toBe(root);
  });

  it('sets SHOW_BROWSER=1 for the fetcher when the toggle is on', async () => {
    const fetch = await specOf(commandStep(plan(true, { PATH: '/bin' }), STEP_IDS.FETCH_REPORTS));

    expect(fetch.env).toEqual({ PATH: '/bin', SHOW_BROWSER: '1' });
  });

  it('leaves SHOW_BROWSER out of the fetcher environment when the toggle is off', async () => {
    const fetch = await specOf(
      commandStep(plan(false, { PATH: '/bin', SHOW_BROWSER: '0' }), STEP_IDS.FETCH_REPORTS),
    );

    expect(fetch.env).toEqual({ PATH: '/bin' });
    expect(fetch.env !== undefined && 'SHOW_BROWSER' in fetch.env).toBe(false);
  });

  // ── End-to-end with a scripted runner ─────────────────────

  interface Scenario {
    browsers: number;
    fetch: number;
    convert: number;
  }

  function scenarioRunner(codes: Scenario): { runner: ProcessRunner; calls: string[] } {
    const calls: string[] = [];
    const outputDir = path.join(root, 'output');
    return {
      calls,
      runner: {
        async run(spec: CommandSpec): Promise<number> {
          if (spec.args.includes('fetch')) {
            calls.push('fetch');
            return codes.fetch;
          }
          if (spec.args.includes('convert')) {
            calls.push('convert');
            await mkdir(outputDir, { recursive: true });
            await writeFile(path.join(outputDir, 'Alabama-dui-data.csv'), 'year\n');
            return codes.convert;
          }
          if (spec.command.endsWith('playwright')) {
            calls.push('browsers');
            return codes.browsers;
          }
          calls.push(spec.command === 'npm' ? 'upgrade' : 'install');
          return 0;
        },
      },
    };
  }

  it('completes with exit 0 when only the browser install fails', async () => {
    await writeFile(path.join(root, 'runtime-packages.txt'), 'playwright@^1.47.2\n');
    const { runner, calls } = scenarioRunner({ browsers: 1, fetch: 0, convert: 0 });

    const summary = await runSequence(plan(false), runner);

    expect(summary.exitCode).toBe(0);
    expect(calls).toEqual(['upgrade', 'install', 'browsers', 'fetch', 'convert']);
    expect(summary.steps.map((s) => s.status)).toEqual([
      'passed',
      'passed',
      'passed',
      'tolerated',
      'passed',
      'passed',
    ]);
    expect(await readdir(path.join(root, 'output'))).toEqual(['Alabama-dui-data.csv']);
    expect(await readdir(path.join(root, '.runtime'))).toEqual(['package.json']);
  });

  it('exits with the fetcher code and never converts when the fetcher fails', async () => {
    await writeFile(path.join(root, 'runtime-packages.txt'), 'playwright@^1.47.2\n');
    await mkdir(path.join(root, 'output'));
    await writeFile(path.join(root, 'output', 'previous.csv'), 'year\n');
    const { runner, calls } = scenarioRunner({ browsers: 0, fetch: 2, convert: 0 });

    const summary = await runSequence(plan(false), runner);

    expect(summary.exitCode).toBe(2);
    expect(calls).not.toContain('convert');
    expect(summary.steps[5]).toMatchObject({ id: STEP_IDS.CONVERT_REPORTS, status: 'skipped' });
    expect(await readdir(path.join(root, 'output'))).toEqual(['previous.csv']);
  });

  it('fails the dependency step with exit 1 when the manifest is missing', async () => {
    const { runner, calls } = scenarioRunner({ browsers: 0, fetch: 0, convert: 0 });

    const summary = await runSequence(plan(false), runner);

    expect(summary.exitCode).toBe(1);
    expect(calls).toEqual(['upgrade']);
    expect(summary.steps[2]).toMatchObject({ id: STEP_IDS.INSTALL_DEPENDENCIES, status: 'failed' });
  });
});

describe('fetcherEnv', () => {
  it('does not modify the base environment', () => {
    const base: NodeJS.ProcessEnv = { SHOW_BROWSER: 'yes' };

    fetcherEnv(base, false);

    expect(base).toEqual({ SHOW_BROWSER: 'yes' });
  });
});
