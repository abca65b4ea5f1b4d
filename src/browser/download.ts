import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import type { FetchOutcome, ReportState } from '../schema/index.js';
import { FIRST_ENDPOINTS, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { resolveSiteUrl } from './links.js';
import { encodeForm, extractProgressForm } from './progressForm.js';
import { buildSasFormBody, NAVIGATION_HEADERS, SAS_HEADERS } from './sas.js';
import type { ReportQuery } from './sas.js';
import type { HttpReply, ReportSession } from './session.js';

// ── Public types ─────────────────────────────────────────────

export interface DownloadOptions {
  scrapedDir: string;
  query: ReportQuery;
}

/** Status the SAS server answers with when the guest session must log in first. */
export const SSO_REQUIRED_STATUS = 449;

const ssoReplySchema = z.object({
  uri: z.string().min(1).optional(),
  URI: z.string().min(1).optional(),
});

export function reportFileName(state: ReportState): string {
  return `${state.name}-dui-data.xlsx`;
}

// ── SSO handshake ────────────────────────────────────────────

async function readSsoUri(reply: HttpReply): Promise<string | undefined> {
  const text = await reply.text();
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    log.detail('SSO reply is not JSON');
    return undefined;
  }
  const parsed = ssoReplySchema.safeParse(body);
  if (!parsed.success) return undefined;
  return parsed.data.uri ?? parsed.data.URI;
}

async function postQuery(
  session: ReportSession,
  state: ReportState,
  body: string,
): Promise<HttpReply> {
  const reply = await session.post(
    FIRST_ENDPOINTS.SAS_URL,
    body,
    SAS_HEADERS,
    TIMEOUTS.REQUEST_TIMEOUT,
  );
  log.detail(`POST ${state.name}: status ${String(reply.status())}`);

  if (reply.status() !== SSO_REQUIRED_STATUS) return reply;

  const uri = await readSsoUri(reply);
  if (uri === undefined) return reply;

  const authUrl = resolveSiteUrl(uri);
  log.detail(`Following SSO auth URI: ${authUrl}`);
  await session.get(authUrl, NAVIGATION_HEADERS, TIMEOUTS.REQUEST_TIMEOUT);

  const retry = await session.post(
    FIRST_ENDPOINTS.SAS_URL,
    body,
    SAS_HEADERS,
    TIMEOUTS.REQUEST_TIMEOUT,
  );
  log.detail(`POST retry ${state.name}: status ${String(retry.status())}`);
  return retry;
}

// ── Report page ──────────────────────────────────────────────

/** Submit a pending ProgressForm once; otherwise use the page as returned. */
async function resolveReportHtml(session: ReportSession, html: string): Promise<string> {
  const form = extractProgressForm(html);
  if (form === null) return html;

  log.detail(`Submitting ProgressForm to ${form.action}`);
  const reply = await session.post(
    form.action,
    encodeForm(form.fields),
    {
      ...NAVIGATION_HEADERS,
      'content-type': 'application/x-www-form-urlencoded',
    },
    TIMEOUTS.REQUEST_TIMEOUT,
  );
  const text = await reply.text();
  log.detail(`ProgressForm returned ${String(reply.status())} (${String(text.length)} chars)`);
  return text;
}

// ── Public API ──────────────────────────────────────────────

/**
 * Query FIRST for one state's report and save the workbook it links to.
 * Network and browser errors propagate; the caller decides whether to go on.
 */
export async function fetchStateReport(
  session: ReportSession,
  state: ReportState,
  options: DownloadOptions,
): Promise<FetchOutcome> {
  const body = buildSasFormBody(state.id, options.query);
  const reply = await postQuery(session, state, body);
  const html = await resolveReportHtml(session, await reply.text());

  await session.render(html);
  const link = await session.findReportLink(TIMEOUTS.LINK_WAIT_TIMEOUT);
  if (!link) {
    log.warn(`Could not find xlsx link for ${state.name}`);
    return { state: state.name, status: 'no-link' };
  }

  const download = await session.get(
    resolveSiteUrl(link),
    NAVIGATION_HEADERS,
    TIMEOUTS.DOWNLOAD_TIMEOUT,
  );
  if (download.status() !== 200) {
    log.warn(`Failed to download file for ${state.name}: ${String(download.status())}`);
    return { state: state.name, status: 'download-failed', httpStatus: download.status() };
  }

  const outPath = path.join(options.scrapedDir, reportFileName(state));
  await writeFile(outPath, await download.body());
  log.saved(outPath);
  return { state: state.name, status: 'saved', path: outPath };
}
