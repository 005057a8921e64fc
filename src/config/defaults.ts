/**
 * Default configuration values.
 * Timeouts and pacing are overridable via config file.
 */

export const TIMEOUTS = {
  NAVIGATION_TIMEOUT: 30_000,
  ELEMENT_WAIT: 5_000,
  OFFER_BUTTON_WAIT: 3_000,
  CONNECT_DEADLINE: 15_000,
  DRIVER_STOP_GRACE: 3_000,
} as const;

export const PACING = {
  TICK_RATE_HZ: 30,
  CHALLENGE_POLL: 1_000,
  ENRICH_DELAY: 1_500,
  COMPLETE_DELAY: 500,
  CONNECT_RETRY: 500,
  DRIVER_STARTUP: 1_000,
  OFFER_SETTLE: 2_000,
} as const;

// Progress checkpoints for the inventory pipeline. Stats add one increment
// per successful scrape on top of CHALLENGE_CLEARED.
export const PROGRESS = {
  CONNECTING: 0.05,
  CLIENT_READY: 0.1,
  NAVIGATED: 0.2,
  CHALLENGE_CLEARED: 0.25,
  STAT_INCREMENT: 0.05,
  INDEX_EXPANDED: 0.45,
  EXTRACTED: 0.55,
  ENRICHED: 0.95,
  COMPLETE: 1,
} as const;

export const DRIVER = {
  DEBUG_PORT: 9222,
  BROWSER_BINARY: 'google-chrome',
} as const;

export const URLS = {
  ITEM_PAGE: 'https://www.ebay.com/itm/',
  SELLER_OVERVIEW: 'https://www.ebay.com/mys/overview',
  FUNDS: 'https://www.ebay.com/mes/transactionlist',
} as const;

export const MARKERS = {
  CHALLENGE: 'captcha',
} as const;

export const LIMITS = {
  MAX_OFFER_SKIPS: 3,
  DASHBOARD_ROWS: 15,
} as const;

export const DEFAULT_CONFIG_PATH = '.shelfscan.yaml';
export const DEFAULT_OUTPUT_PATH = 'output/listings.csv';
