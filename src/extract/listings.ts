import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';

import { emptyListing, isAcceptedListing } from '../schema/listing.js';
import type { Listing } from '../schema/listing.js';
import {
  CONTAINER_SELECTORS,
  FIELD_SELECTORS,
  ITEM_PATH_PATTERN,
  MARKER_RULES,
  PLACEHOLDER_TITLES,
} from './catalog.js';
import { parseCount } from './counts.js';
import { allTexts, firstMatching, firstText, hasMarker } from './fallback.js';

// ── Public types ─────────────────────────────────────────────

export interface ExtractOptions {
  /** Base for resolving relative listing links. */
  baseUrl?: string | undefined;
}

// ── Extractor ────────────────────────────────────────────────

/**
 * Turn listing-index markup into listings, in document order.
 *
 * The first container selector that matches anything is used for the
 * whole page. Every field then resolves through its own fallback catalog
 * and candidates without both a title and a price are dropped. A card
 * repeating an item id already seen on the page is skipped.
 */
export function extractListings(html: string, options: ExtractOptions = {}): Listing[] {
  const $ = cheerio.load(html);
  const containers = firstMatching($, CONTAINER_SELECTORS);
  if (!containers) return [];

  const listings: Listing[] = [];
  const seen = new Set<string>();
  for (const el of containers.elements) {
    const listing = extractCard($, $(el), options);
    if (!isAcceptedListing(listing)) continue;
    if (listing.itemId !== undefined) {
      if (seen.has(listing.itemId)) continue;
      seen.add(listing.itemId);
    }
    listings.push(listing);
  }
  return listings;
}

function extractCard(
  $: CheerioAPI,
  card: Cheerio<AnyNode>,
  options: ExtractOptions,
): Listing {
  const listing = emptyListing();
  const text = (catalog: readonly string[]): string => firstText($, card, catalog) ?? '';

  const title = text(FIELD_SELECTORS.title);
  listing.title = PLACEHOLDER_TITLES.includes(title.toLowerCase()) ? '' : title;
  listing.price = text(FIELD_SELECTORS.price);
  listing.shipping = text(FIELD_SELECTORS.shipping);
  listing.condition = text(FIELD_SELECTORS.condition);
  listing.seller = text(FIELD_SELECTORS.seller);
  listing.sellerFeedback = text(FIELD_SELECTORS.sellerFeedback);
  listing.location = text(FIELD_SELECTORS.location);
  listing.watchers = parseCount(text(FIELD_SELECTORS.watchers));
  listing.quantityAvailable = parseCount(text(FIELD_SELECTORS.quantityAvailable));
  listing.notes = allTexts($, card, FIELD_SELECTORS.notes);

  listing.buyItNow = hasMarker($, card, MARKER_RULES.buyItNow);
  listing.acceptsOffers = hasMarker($, card, MARKER_RULES.acceptsOffers);
  listing.isNewListing = hasMarker($, card, MARKER_RULES.isNewListing);

  const identity = findItemLink($, card, options.baseUrl);
  if (identity) {
    listing.itemId = identity.itemId;
    listing.url = identity.url;
  }

  return listing;
}

// ── Identity ─────────────────────────────────────────────────

/** Parse the item id out of a listing link, if it is one. */
export function parseItemId(href: string): string | undefined {
  return ITEM_PATH_PATTERN.exec(href)?.[1];
}

function findItemLink(
  $: CheerioAPI,
  card: Cheerio<AnyNode>,
  baseUrl: string | undefined,
): { itemId: string; url: string } | undefined {
  for (const anchor of card.find('a[href]').toArray()) {
    const href = $(anchor).attr('href');
    if (!href) continue;
    const itemId = parseItemId(href);
    if (itemId) {
      return { itemId, url: resolveUrl(href, baseUrl) };
    }
  }
  return undefined;
}

function resolveUrl(href: string, baseUrl: string | undefined): string {
  if (!baseUrl) return href;
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return href;
  }
}
