import * as cheerio from 'cheerio';

import { FIRST_ENDPOINTS } from '../config/defaults.js';

// ── Public types ─────────────────────────────────────────────

export interface ProgressForm {
  action: string;
  fields: Record<string, string>;
}

// ── Extraction ──────────────────────────────────────────────

/**
 * Find the auto-submitting `ProgressForm` the SAS server returns while a
 * job is still running. Returns the absolute action URL and every named
 * input/textarea value, or null when the page has no such form.
 */
export function extractProgressForm(html: string): ProgressForm | null {
  const $ = cheerio.load(html);

  let form = $('form[name="ProgressForm"]').first();
  if (form.length === 0) {
    form = $('form#ProgressForm').first();
  }
  if (form.length === 0) return null;

  let action = form.attr('action') || FIRST_ENDPOINTS.SAS_URL;
  if (action.startsWith('/')) {
    action = FIRST_ENDPOINTS.BASE + action;
  }

  const fields: Record<string, string> = {};
  form.find('input, textarea').each((_, el) => {
    const field = $(el);
    const name = field.attr('name');
    if (!name) return;
    fields[name] = field.attr('value') ?? '';
  });

  return { action, fields };
}

export function encodeForm(fields: Record<string, string>): string {
  return new URLSearchParams(fields).toString();
}
