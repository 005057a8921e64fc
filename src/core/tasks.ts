import type { Connector } from '../browser/connect.js';
import { ConnectError } from '../browser/errors.js';
import type { SerialSession } from '../browser/serialSession.js';
import { PACING, PROGRESS, TIMEOUTS, URLS } from '../config/defaults.js';
import {
  CONTAINER_SELECTORS,
  FUNDS_SELECTORS,
  SEE_ALL_SELECTORS,
  STATS_SELECTORS,
  extractDescriptionDocument,
  extractItemDetails,
  extractListings,
  readAvailableFunds,
  readStatCount,
  readStatText,
} from '../extract/index.js';
import type { ItemDetails, StatField } from '../extract/index.js';
import type { Listing } from '../schema/listing.js';
import { writeListingStore } from '../store/listingStore.js';
import * as log from '../utils/logger.js';
import { sleep } from '../utils/timing.js';
import type { Emit } from './events.js';

// Background work started by the runtime for each reducer effect. A task
// never touches the state; it reports back by emitting events.

type Sleep = (ms: number) => Promise<void>;

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ── Connect ──────────────────────────────────────────────────

export async function runConnect(connector: Connector, emit: Emit): Promise<void> {
  try {
    const browser = await connector();
    if (!emit({ type: 'clientReady', browser })) {
      // Shut down while connecting: nobody will own this connection.
      await browser.close();
    }
  } catch (err) {
    const stage = err instanceof ConnectError ? err.stage : 'session';
    log.error(`Browser connection failed: ${describe(err)}`);
    emit({ type: 'connectFailed', stage, message: describe(err) });
  }
}

// ── Navigate ─────────────────────────────────────────────────

export async function runNavigate(session: SerialSession, url: string, emit: Emit): Promise<void> {
  try {
    await session.exclusive((s) => s.navigate(url));
    log.stage('navigate', `Loaded ${url}`);
    emit({ type: 'navigationComplete' });
  } catch (err) {
    log.error(`Navigation to ${url} failed: ${describe(err)}`);
    emit({ type: 'navigationFailed', message: describe(err) });
  }
}

// ── Seller stats ─────────────────────────────────────────────

export interface StatsOptions {
  elementWaitMs?: number | undefined;
}

async function readStatPage(
  session: SerialSession,
  field: StatField,
  waitMs: number,
): Promise<string> {
  return session.exclusive(async (s) => {
    const [primary] = STATS_SELECTORS[field];
    if (!(await s.waitFor(primary, waitMs))) {
      log.detail(`${primary} did not appear, trying fallbacks`);
    }
    return s.content();
  });
}

/**
 * Items sold, feedback and followers, in that order. Each read fails on
 * its own and leaves the value unknown.
 */
export async function runStatsScrape(
  session: SerialSession,
  emit: Emit,
  options: StatsOptions = {},
): Promise<void> {
  const waitMs = options.elementWaitMs ?? TIMEOUTS.ELEMENT_WAIT;

  try {
    const count = readStatCount(await readStatPage(session, 'itemsSold', waitMs), 'itemsSold');
    if (count === undefined) log.detail('Items sold not found');
    else emit({ type: 'scrapeItemsSold', count });
  } catch (err) {
    log.warn(`Could not read items sold: ${describe(err)}`);
  }

  try {
    const text = readStatText(await readStatPage(session, 'feedback', waitMs), 'feedback');
    if (text === undefined) log.detail('Feedback score not found');
    else emit({ type: 'scrapeFeedback', text });
  } catch (err) {
    log.warn(`Could not read feedback: ${describe(err)}`);
  }

  try {
    const count = readStatCount(await readStatPage(session, 'followers', waitMs), 'followers');
    if (count === undefined) log.detail('Follower count not found');
    else emit({ type: 'scrapeFollowerCount', count });
  } catch (err) {
    log.warn(`Could not read followers: ${describe(err)}`);
  }

  emit({ type: 'statsComplete' });
}

// ── Funds ────────────────────────────────────────────────────

export interface FundsOptions extends StatsOptions {
  fundsUrl?: string | undefined;
}

/** Open the transaction list and read the available funds. */
export async function runFundsScrape(
  session: SerialSession,
  emit: Emit,
  options: FundsOptions = {},
): Promise<void> {
  const waitMs = options.elementWaitMs ?? TIMEOUTS.ELEMENT_WAIT;
  const url = options.fundsUrl ?? URLS.FUNDS;

  try {
    const html = await session.exclusive(async (s) => {
      await s.navigate(url);
      const [primary] = FUNDS_SELECTORS;
      if (!(await s.waitFor(primary, waitMs))) {
        log.detail(`${primary} did not appear, trying fallbacks`);
      }
      return s.content();
    });
    const text = readAvailableFunds(html);
    if (text === undefined) log.detail('Available funds not found');
    else emit({ type: 'scrapeFunds', text });
  } catch (err) {
    log.warn(`Could not read available funds: ${describe(err)}`);
  }

  emit({ type: 'fundsComplete' });
}

// ── Listing index ────────────────────────────────────────────

export const SCROLL_TO_BOTTOM = 'window.scrollTo(0, document.body.scrollHeight)';

/** Follow a "see all" link when there is one, then scroll to the bottom. */
export async function runExpandIndex(
  session: SerialSession,
  emit: Emit,
  options: StatsOptions = {},
): Promise<void> {
  const waitMs = options.elementWaitMs ?? TIMEOUTS.ELEMENT_WAIT;

  try {
    await session.exclusive(async (s) => {
      let clicked = false;
      for (const selector of SEE_ALL_SELECTORS) {
        const link = await s.find(selector);
        if (link) {
          await link.click();
          clicked = true;
          break;
        }
      }
      if (clicked) {
        await s.waitFor(CONTAINER_SELECTORS.join(', '), waitMs);
      } else {
        log.detail('No "see all" link, using the current page');
      }
      await s.executeScript(SCROLL_TO_BOTTOM);
    });
  } catch (err) {
    log.warn(`Could not expand the listing index: ${describe(err)}`);
  }

  emit({ type: 'extractListings' });
}

export async function runExtractListings(session: SerialSession, emit: Emit): Promise<void> {
  let listings: Listing[] = [];
  try {
    const page = await session.exclusive(async (s) => ({
      html: await s.content(),
      url: await s.currentUrl(),
    }));
    listings = extractListings(page.html, { baseUrl: page.url });
    log.stage('extract', `${String(listings.length)} listings on ${page.url}`);
  } catch (err) {
    log.warn(`Could not read the listing index: ${describe(err)}`);
  }
  emit({ type: 'scrapeListings', listings });
}

// ── Enrichment ───────────────────────────────────────────────

export interface EnrichOptions {
  delayMs?: number | undefined;
  itemPageBase?: string | undefined;
  sleep?: Sleep | undefined;
}

function usableItemId(listing: Listing): string | undefined {
  const id = listing.itemId;
  return id !== undefined && /^\d+$/.test(id) ? id : undefined;
}

/**
 * Visit each listing's detail page, one at a time, and fill in its item
 * specifics and description. `listings` is a snapshot owned by this task.
 */
export async function runEnrichment(
  session: SerialSession,
  listings: Listing[],
  emit: Emit,
  options: EnrichOptions = {},
): Promise<void> {
  const pause = options.sleep ?? sleep;
  const delayMs = options.delayMs ?? PACING.ENRICH_DELAY;
  const base = options.itemPageBase ?? URLS.ITEM_PAGE;

  const targets = listings.flatMap((listing) => {
    const itemId = usableItemId(listing);
    return itemId === undefined ? [] : [{ listing, itemId }];
  });
  log.stage('enrich', `${String(targets.length)} of ${String(listings.length)} listings have an item id`);

  for (const [index, { listing, itemId }] of targets.entries()) {
    if (session.isClosed) break;
    if (index > 0) await pause(delayMs);

    try {
      const details = await session.exclusive(async (s): Promise<ItemDetails> => {
        const pageUrl = `${base}${itemId}`;
        await s.navigate(pageUrl);
        const found = extractItemDetails(await s.content());
        if (found.description === undefined && found.descriptionFrameUrl !== undefined) {
          await s.navigate(new URL(found.descriptionFrameUrl, pageUrl).toString());
          found.description = extractDescriptionDocument(await s.content());
        }
        return found;
      });

      if (details.itemSpecifics.length > 0) listing.itemSpecifics = details.itemSpecifics;
      if (details.description !== undefined) listing.description = details.description;
    } catch (err) {
      log.warn(`Skipping details for item ${itemId}: ${describe(err)}`);
    }

    const done = index + 1;
    emit({
      type: 'setProgress',
      progress:
        PROGRESS.EXTRACTED + ((PROGRESS.ENRICHED - PROGRESS.EXTRACTED) * done) / targets.length,
      message: `Enriched ${String(done)}/${String(targets.length)} listings`,
    });
  }

  emit({ type: 'enrichedListings', listings });
}

// ── Persist ──────────────────────────────────────────────────

export interface PersistOptions {
  completeDelayMs?: number | undefined;
  sleep?: Sleep | undefined;
}

export async function runPersist(
  listings: readonly Listing[],
  outputPath: string,
  emit: Emit,
  options: PersistOptions = {},
): Promise<void> {
  try {
    const count = await writeListingStore(outputPath, listings);
    log.saved(count, outputPath);
    emit({ type: 'listingsPersisted', count, path: outputPath });
  } catch (err) {
    log.error(`Could not save listings to ${outputPath}: ${describe(err)}`);
    emit({ type: 'persistFailed', message: describe(err) });
  }

  await (options.sleep ?? sleep)(options.completeDelayMs ?? PACING.COMPLETE_DELAY);
  emit({ type: 'scrapingComplete' });
}
