import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { ConversionOutcome } from '../schema/index.js';
import { CSV_HEADER, readWorkbookRows, simplifyReportTable, toCsv } from '../convert/index.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface ConvertConfig {
  scrapedDir: string;
  outputDir: string;
}

// ── Single workbook ─────────────────────────────────────────

export async function convertWorkbook(
  sourcePath: string,
  outputDir: string,
): Promise<ConversionOutcome> {
  log.info(`Processing ${sourcePath}`);
  const rows = readWorkbookRows(await readFile(sourcePath));
  const table = simplifyReportTable(rows);

  if (table.status === 'no-header') {
    log.warn(`Could not locate month header in ${sourcePath}; skipping`);
    return { source: sourcePath, status: 'no-header' };
  }
  if (table.status === 'no-rows') {
    log.warn(`No data rows found in ${sourcePath}`);
    return { source: sourcePath, status: 'no-rows' };
  }

  const outPath = path.join(outputDir, path.basename(sourcePath, path.extname(sourcePath)) + '.csv');
  await writeFile(outPath, toCsv([CSV_HEADER, ...table.rows]), 'utf-8');
  log.detail(`Wrote ${outPath} (${String(table.rows.length)} rows)`);
  return { source: sourcePath, status: 'written', path: outPath, rows: table.rows.length };
}

// ── Directory ───────────────────────────────────────────────

export async function listWorkbooks(scrapedDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(scrapedDir);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
    throw err;
  }
  return entries
    .filter((name) => name.endsWith('.xlsx'))
    .sort()
    .map((name) => path.join(scrapedDir, name));
}

/** Convert every `.xlsx` in `scrapedDir`, in name order. */
export async function convertReports(config: ConvertConfig): Promise<ConversionOutcome[]> {
  await mkdir(config.outputDir, { recursive: true });
  const files = await listWorkbooks(config.scrapedDir);
  if (files.length === 0) {
    log.warn(`No .xlsx files found in ${config.scrapedDir}`);
    return [];
  }

  const outcomes: ConversionOutcome[] = [];
  for (const file of files) {
    outcomes.push(await convertWorkbook(file, config.outputDir));
  }
  return outcomes;
}
