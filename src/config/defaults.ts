/**
 * Default configuration values.
 * Paths and query settings are overridable via config file.
 */

export const TIMEOUTS = {
  NAVIGATION_TIMEOUT: 60_000,
  REQUEST_TIMEOUT: 60_000,
  DOWNLOAD_TIMEOUT: 120_000,
  LINK_WAIT_TIMEOUT: 180_000,
  REQUEST_DELAY: 1_000,
} as const;

export const PATHS = {
  CONFIG_FILE: '.first-reports.yaml',
  ENV_DIR: '.runtime',
  MANIFEST: 'runtime-packages.txt',
  STATE_LIST: 'state-list.json',
  SCRAPED_DIR: 'scraped',
  OUTPUT_DIR: 'output',
} as const;

export const QUERY_DEFAULTS = {
  FIRST_YEAR: 2010,
  LAST_YEAR: 2023,
  RELEASE_LABEL: 'Version 9.2.1, released Nov 13, 2025',
} as const;

export const FIRST_ENDPOINTS = {
  BASE: 'https://cdan.dot.gov',
  QUERY_URL: 'https://cdan.dot.gov/query',
  SAS_URL: 'https://cdan.dot.gov/SASJobExecution/?sso_guest=true',
  PROGRAM: '/Public/OTRA/Apps/FIRST/FIRST',
  APP_HOST: 'cdan.dot.gov',
} as const;

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  CONFIG_ERROR: 4,
  SPAWN_FAILURE: 127,
  SIGNAL_BASE: 128,
} as const;

export const CONVERSION = {
  /** Minimum number of month names for a row to count as the table header. */
  MIN_MONTH_HEADERS: 6,
} as const;
