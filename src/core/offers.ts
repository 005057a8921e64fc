import * as cheerio from 'cheerio';

import type { SerialSession } from '../browser/serialSession.js';
import { LIMITS, PACING, TIMEOUTS, URLS } from '../config/defaults.js';
import { OFFER_SELECTORS } from '../extract/catalog.js';
import * as log from '../utils/logger.js';
import { sleep } from '../utils/timing.js';

// ── Pricing ──────────────────────────────────────────────────

/** "$1,234.50" or "US $12.00 to $15.00" → the first amount. */
export function parsePriceText(text: string): number | undefined {
  const match = /(\d[\d,]*(?:\.\d+)?)/.exec(text);
  if (!match?.[1]) return undefined;
  const value = Number(match[1].replace(/,/g, ''));
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

/** Price after a `percentage` discount, rounded to cents. */
export function computeOfferPrice(price: number, percentage: number): number {
  return Math.round(price * (1 - percentage / 100) * 100) / 100;
}

/** Price text of the first offer card that still has a send button. */
export function firstOfferCandidate(html: string): string | undefined {
  const $ = cheerio.load(html);
  for (const card of $(OFFER_SELECTORS.card).toArray()) {
    const $card = $(card);
    if ($card.find(OFFER_SELECTORS.sendButton).length === 0) continue;
    const text = $card.find(OFFER_SELECTORS.price).first().text().trim();
    return text || undefined;
  }
  return undefined;
}

// ── Sweep ────────────────────────────────────────────────────

export interface OfferSweepOptions {
  overviewUrl?: string | undefined;
  buttonWaitMs?: number | undefined;
  elementWaitMs?: number | undefined;
  settleMs?: number | undefined;
  maxSkips?: number | undefined;
  sleep?: ((ms: number) => Promise<void>) | undefined;
}

export interface OfferSweepResult {
  sent: number;
  skipped: number;
}

type CardOutcome =
  | { kind: 'exhausted' }
  | { kind: 'skipped'; priceText: string }
  | { kind: 'sent'; price: number; offer: number };

/**
 * Send a discount offer for every pending card on the seller overview.
 *
 * Each round reloads the overview and handles the first card with a send
 * button. Cards with an unreadable price are skipped; after `maxSkips`
 * skips in a row the sweep stops, since the same card keeps coming back.
 */
export async function runOfferSweep(
  session: SerialSession,
  percentage: number,
  options: OfferSweepOptions = {},
): Promise<OfferSweepResult> {
  const overviewUrl = options.overviewUrl ?? URLS.SELLER_OVERVIEW;
  const buttonWaitMs = options.buttonWaitMs ?? TIMEOUTS.OFFER_BUTTON_WAIT;
  const elementWaitMs = options.elementWaitMs ?? TIMEOUTS.ELEMENT_WAIT;
  const settleMs = options.settleMs ?? PACING.OFFER_SETTLE;
  const maxSkips = options.maxSkips ?? LIMITS.MAX_OFFER_SKIPS;
  const pause = options.sleep ?? sleep;

  const result: OfferSweepResult = { sent: 0, skipped: 0 };
  let skipsInARow = 0;

  while (skipsInARow < maxSkips) {
    const outcome = await session.exclusive(async (s): Promise<CardOutcome> => {
      await s.navigate(overviewUrl);
      await pause(settleMs);

      const button = await s.waitFor(OFFER_SELECTORS.sendButton, buttonWaitMs);
      if (!button) return { kind: 'exhausted' };

      const priceText = firstOfferCandidate(await s.content()) ?? '';
      const price = parsePriceText(priceText);
      if (price === undefined) return { kind: 'skipped', priceText };
      const offer = computeOfferPrice(price, percentage);

      await button.click();
      await pause(settleMs);

      const input = await s.waitFor(OFFER_SELECTORS.amountInput, elementWaitMs);
      if (!input) throw new Error('Offer amount field did not appear');
      await input.sendKeys(offer.toFixed(2));

      // Review and submit share one button slot.
      for (const step of ['review', 'submit']) {
        const next = await s.waitFor(OFFER_SELECTORS.review, elementWaitMs);
        if (!next) throw new Error(`Offer ${step} button did not appear`);
        await next.scrollIntoView();
        await next.click();
        await pause(settleMs);
      }

      return { kind: 'sent', price, offer };
    });

    if (outcome.kind === 'exhausted') {
      log.offer('No more send-offer buttons');
      break;
    }
    if (outcome.kind === 'skipped') {
      result.skipped++;
      skipsInARow++;
      log.warn(`Skipping offer card with unreadable price "${outcome.priceText}"`);
      continue;
    }

    skipsInARow = 0;
    result.sent++;
    log.offer(`Sent offer $${outcome.offer.toFixed(2)} (was $${outcome.price.toFixed(2)})`);
  }

  if (skipsInARow >= maxSkips) {
    log.warn(`Stopped after ${String(skipsInARow)} unreadable offer cards in a row`);
  }
  log.offer(`Offers sent: ${String(result.sent)}`);
  return result;
}
