import * as cheerio from 'cheerio';

import { FUNDS_SELECTORS, STATS_SELECTORS } from './catalog.js';
import { parseCount } from './counts.js';
import { firstText } from './fallback.js';

// ── Seller card ──────────────────────────────────────────────

export type StatField = keyof typeof STATS_SELECTORS;

/** Raw text of one seller-card statistic, or `undefined` when absent. */
export function readStatText(html: string, field: StatField): string | undefined {
  const $ = cheerio.load(html);
  return firstText($, $.root(), STATS_SELECTORS[field]);
}

/** Numeric statistic such as "1.2K items sold" → 1200. */
export function readStatCount(html: string, field: StatField): number | undefined {
  const text = readStatText(html, field);
  return text === undefined ? undefined : parseCount(text);
}

// ── Funds ────────────────────────────────────────────────────

/** Available funds on the transaction list, as printed. */
export function readAvailableFunds(html: string): string | undefined {
  const $ = cheerio.load(html);
  return firstText($, $.root(), FUNDS_SELECTORS);
}
