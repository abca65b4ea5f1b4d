import { FIRST_ENDPOINTS } from '../config/defaults.js';

// ── FIRST query ─────────────────────────────────────────────

export interface ReportQuery {
  firstYear: number;
  lastYear: number;
  releaseLabel: string;
}

export function crashYears(query: ReportQuery): number[] {
  const years: number[] = [];
  for (let y = query.firstYear; y <= query.lastYear; y++) {
    years.push(y);
  }
  return years;
}

/**
 * The SAS query string for the alcohol-impaired driver fatalities
 * report of one state, tabulated by year (rows) and month (columns).
 * The year list keeps its trailing comma; the server expects it.
 */
export function buildSasQueryString(stateId: string, query: ReportQuery): string {
  const years = crashYears(query).map(String).join(',');
  return (
    '&topic_num=26&metric_num=33&metrictype_num=37' +
    `&CrashYear=${years},` +
    `&State=${stateId}&A_PTYPE=1&DRIMPAIR_A=9&TableRows=YEAR&TableCols=MONTH` +
    `&ReleaseDate=${query.releaseLabel}&ReportType=1` +
    `&Criteria=Years: ${String(query.firstYear)}-${String(query.lastYear)}`
  );
}

/** Form-encoded body for the SAS job execution endpoint. */
export function buildSasFormBody(stateId: string, query: ReportQuery): string {
  return new URLSearchParams({
    SASQueryString: buildSasQueryString(stateId, query),
    _program: FIRST_ENDPOINTS.PROGRAM,
    _apphostname: FIRST_ENDPOINTS.APP_HOST,
  }).toString();
}

export const SAS_HEADERS: Readonly<Record<string, string>> = {
  'x-requested-with': 'XMLHttpRequest',
  referer: FIRST_ENDPOINTS.QUERY_URL,
  origin: FIRST_ENDPOINTS.BASE,
  accept: '*/*',
  'content-type': 'application/x-www-form-urlencoded',
};

export const NAVIGATION_HEADERS: Readonly<Record<string, string>> = {
  referer: FIRST_ENDPOINTS.QUERY_URL,
  origin: FIRST_ENDPOINTS.BASE,
};
