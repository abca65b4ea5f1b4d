import { chromium } from 'playwright';

import { FIRST_ENDPOINTS, TIMEOUTS } from '../config/defaults.js';
import { messageOf } from '../config/errors.js';
import * as log from '../utils/logger.js';
import { XLSX_LINK_SELECTOR } from './links.js';

// ── Public types ─────────────────────────────────────────────

/** The parts of an HTTP response the fetcher reads. */
export interface HttpReply {
  status(): number;
  text(): Promise<string>;
  body(): Promise<Buffer>;
}

export type RequestHeaders = Readonly<Record<string, string>>;

/**
 * A browser session on the FIRST site. Requests share the page's
 * cookies; rendered HTML runs its inline scripts before links are read.
 */
export interface ReportSession {
  post(url: string, form: string, headers: RequestHeaders, timeout: number): Promise<HttpReply>;
  get(url: string, headers: RequestHeaders, timeout: number): Promise<HttpReply>;
  render(html: string): Promise<void>;
  findReportLink(timeout: number): Promise<string | null>;
  close(): Promise<void>;
}

export interface SessionConfig {
  headless: boolean;
}

// ── Session launcher ─────────────────────────────────────────

/**
 * Launch Chromium and open the FIRST query page so the context
 * holds the guest session cookies the SAS endpoint requires.
 */
export async function launchReportSession(config: SessionConfig): Promise<ReportSession> {
  const browser = await chromium.launch({ headless: config.headless });
  const context = await browser.newContext();
  const page = await context.newPage();

  try {
    await page.goto(FIRST_ENDPOINTS.QUERY_URL, { timeout: TIMEOUTS.NAVIGATION_TIMEOUT });
  } catch (err) {
    await browser.close();
    throw err;
  }

  const request = context.request;

  return {
    post(url, form, headers, timeout) {
      return request.post(url, { data: form, headers: { ...headers }, timeout });
    },

    get(url, headers, timeout) {
      return request.get(url, { headers: { ...headers }, timeout });
    },

    async render(html: string): Promise<void> {
      try {
        await page.setContent(html, { waitUntil: 'load' });
      } catch (err) {
        log.detail(`setContent failed (${messageOf(err)}); loading as data URL`);
        await page.goto('data:text/html,' + encodeURIComponent(html), {
          timeout: TIMEOUTS.NAVIGATION_TIMEOUT,
        });
      }
    },

    async findReportLink(timeout: number): Promise<string | null> {
      try {
        const handle = await page.waitForSelector(XLSX_LINK_SELECTOR, { timeout });
        return handle ? await handle.getAttribute('href') : null;
      } catch (err) {
        log.detail(`No report link after waiting (${messageOf(err)}); querying the DOM`);
      }

      try {
        return await page.evaluate((selector) => {
          const anchor = document.querySelector(selector);
          return anchor ? anchor.getAttribute('href') : null;
        }, XLSX_LINK_SELECTOR);
      } catch (err) {
        log.detail(`DOM query failed: ${messageOf(err)}`);
        return null;
      }
    },

    async close(): Promise<void> {
      await browser.close();
    },
  };
}
