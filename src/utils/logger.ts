/**
 * Line logger for first-reports.
 *
 * Everything goes to stdout; child processes inherit the same stream,
 * so their output interleaves with the step markers.
 */

import type { StepStatus } from '../schema/index.js';

const STATUS_ICONS: Record<StepStatus, string> = {
  passed: '✅',
  tolerated: '⚠️ ',
  failed: '❌',
  skipped: '⏭️ ',
};

function write(message: string): void {
  process.stdout.write(message + '\n');
}

function counter(index: number, total: number): string {
  const width = String(total).length;
  return `[${String(index + 1).padStart(width)}/${String(total)}]`;
}

// ── General messages ────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function heading(title: string): void {
  write(`\n━━ ${title} ${'━'.repeat(Math.max(3, 46 - title.length))}`);
}

// ── Pipeline progress ───────────────────────────────────────

export function stepStarted(index: number, total: number, title: string): void {
  write(`🚀 ${counter(index, total)} ${title}`);
}

export function stepFinished(
  index: number,
  total: number,
  status: StepStatus,
  title: string,
  exitCode: number,
): void {
  const suffix = status === 'passed' ? '' : ` (${status}, exit ${String(exitCode)})`;
  write(`${STATUS_ICONS[status]} ${counter(index, total)} ${title}${suffix}`);
}

export function command(cmd: string, args: readonly string[]): void {
  write(`   $ ${[cmd, ...args].join(' ')}`);
}

// ── Report fetching ─────────────────────────────────────────

export function stateStarted(index: number, total: number, id: string, name: string): void {
  write(`🗺️  ${counter(index, total)} ${id} ${name}`);
}

export function saved(filePath: string): void {
  write(`💾 ${filePath}`);
}
