/**
 * Browser module.
 * Playwright session on the FIRST site plus the request/parse helpers
 * that turn one state's query into a saved workbook.
 */

export { launchReportSession } from './session.js';
export type { ReportSession, HttpReply, RequestHeaders, SessionConfig } from './session.js';
export { fetchStateReport, reportFileName, SSO_REQUIRED_STATUS } from './download.js';
export type { DownloadOptions } from './download.js';
export { buildSasQueryString, buildSasFormBody, crashYears } from './sas.js';
export type { ReportQuery } from './sas.js';
export { extractProgressForm, encodeForm } from './progressForm.js';
export type { ProgressForm } from './progressForm.js';
export { resolveSiteUrl, XLSX_LINK_SELECTOR } from './links.js';
