import { FIRST_ENDPOINTS } from '../config/defaults.js';

/** Anchors that point at the generated report workbook. */
export const XLSX_LINK_SELECTOR =
  'a[download$=".xlsx"], a[href$=".xlsx"], a[href*="/files/files/"]';

/** Make a link from a FIRST page absolute against the site root. */
export function resolveSiteUrl(link: string): string {
  if (link.startsWith('/')) return FIRST_ENDPOINTS.BASE + link;
  if (link.startsWith('http')) return link;
  return `${FIRST_ENDPOINTS.BASE}/${link}`;
}
