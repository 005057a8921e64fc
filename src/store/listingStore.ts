import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

import { listingSchema } from '../schema/listing.js';
import type { Listing } from '../schema/listing.js';
import { isNotFound } from '../utils/files.js';
import * as log from '../utils/logger.js';
import { CsvSyntaxError, parseCsv, stringifyCsv } from './csv.js';
import type { CsvRecord } from './csv.js';

// ── Format ───────────────────────────────────────────────────

export const STORE_COLUMNS = [
  'title',
  'price',
  'shipping',
  'condition',
  'watchers',
  'seller',
  'seller_feedback',
  'buy_it_now',
  'accepts_offers',
  'location',
  'quantity_available',
  'is_new_listing',
  'item_id',
  'url',
  'notes',
  'item_specifics',
  'description',
] as const;

export type StoreColumn = (typeof STORE_COLUMNS)[number];

const LIST_SEPARATOR = ';';

// ── Error ────────────────────────────────────────────────────

/** The persisted store could not be read back. The file is left untouched. */
export class StoreParseError extends Error {
  readonly line: number;

  constructor(filePath: string, line: number, reason: string) {
    super(`${filePath}:${String(line)}: ${reason}`);
    this.name = 'StoreParseError';
    this.line = line;
  }
}

// ── Lists ────────────────────────────────────────────────────
// Entries are joined with ";". A ";" or "\" inside an entry is escaped
// with a backslash.

function joinList(entries: readonly string[]): string {
  return entries.map((e) => e.replace(/[\\;]/g, (c) => `\\${c}`)).join(LIST_SEPARATOR);
}

function splitList(value: string): string[] {
  const entries: string[] = [];
  let current = '';
  for (let i = 0; i < value.length; i++) {
    const c = value.charAt(i);
    if (c === '\\' && i + 1 < value.length) {
      current += value.charAt(++i);
    } else if (c === LIST_SEPARATOR) {
      entries.push(current);
      current = '';
    } else {
      current += c;
    }
  }
  entries.push(current);
  return entries.map((e) => e.trim()).filter((e) => e.length > 0);
}

// ── Row mapping ──────────────────────────────────────────────

export function listingToRow(listing: Listing): Record<StoreColumn, string> {
  return {
    title: listing.title,
    price: listing.price,
    shipping: listing.shipping,
    condition: listing.condition,
    watchers: listing.watchers === undefined ? '' : String(listing.watchers),
    seller: listing.seller,
    seller_feedback: listing.sellerFeedback,
    buy_it_now: String(listing.buyItNow),
    accepts_offers: String(listing.acceptsOffers),
    location: listing.location,
    quantity_available:
      listing.quantityAvailable === undefined ? '' : String(listing.quantityAvailable),
    is_new_listing: String(listing.isNewListing),
    item_id: listing.itemId ?? '',
    url: listing.url,
    notes: joinList(listing.notes),
    item_specifics: joinList(listing.itemSpecifics),
    description: listing.description ?? '',
  };
}

const storedBoolean = z
  .enum(['true', 'false', ''], {
    errorMap: (_issue, ctx) => ({
      message: `expected true or false, got ${JSON.stringify(ctx.data)}`,
    }),
  })
  .transform((value) => value === 'true');

const storedCount = z
  .string()
  .regex(/^\d*$/, 'expected a whole number')
  .transform((value) => (value === '' ? undefined : Number(value)));

const storedText = z.string().transform((value) => value || undefined);

const storedList = z.string().transform(splitList);

/** One CSV row, keyed by column name, parsed into a `Listing`. */
const storedRowSchema = z
  .object({
    title: z.string(),
    price: z.string(),
    shipping: z.string(),
    condition: z.string(),
    watchers: storedCount,
    seller: z.string(),
    seller_feedback: z.string(),
    buy_it_now: storedBoolean,
    accepts_offers: storedBoolean,
    location: z.string(),
    quantity_available: storedCount,
    is_new_listing: storedBoolean,
    item_id: storedText,
    url: z.string(),
    notes: storedList,
    item_specifics: storedList,
    description: storedText,
  } satisfies Record<StoreColumn, z.ZodTypeAny>)
  .transform((row) => ({
    itemId: row.item_id,
    title: row.title,
    price: row.price,
    shipping: row.shipping,
    condition: row.condition,
    watchers: row.watchers,
    seller: row.seller,
    sellerFeedback: row.seller_feedback,
    buyItNow: row.buy_it_now,
    acceptsOffers: row.accepts_offers,
    location: row.location,
    quantityAvailable: row.quantity_available,
    isNewListing: row.is_new_listing,
    url: row.url,
    notes: row.notes,
    itemSpecifics: row.item_specifics,
    description: row.description,
  }))
  .pipe(listingSchema);

function describeIssue(error: z.ZodError): string {
  const [issue] = error.issues;
  if (!issue) return 'invalid row';
  const column = issue.path.join('.');
  return column ? `column ${column}: ${issue.message}` : issue.message;
}

// ── Merge ────────────────────────────────────────────────────

/**
 * Overlay `incoming` onto `existing`, keyed by item id. Existing order is
 * kept, a later listing with the same id replaces the earlier one in place,
 * and new ids are appended. Listings without an id are left out.
 */
export function mergeListings(
  existing: readonly Listing[],
  incoming: readonly Listing[],
): Listing[] {
  const byId = new Map<string, Listing>();
  for (const listing of [...existing, ...incoming]) {
    if (listing.itemId === undefined) continue;
    byId.set(listing.itemId, listing);
  }
  return [...byId.values()];
}

// ── File IO ──────────────────────────────────────────────────

/** Read the store. A missing file is an empty store. */
export async function readListingStore(filePath: string): Promise<Listing[]> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }

  let records: CsvRecord[];
  try {
    records = parseCsv(text);
  } catch (err) {
    if (err instanceof CsvSyntaxError) {
      throw new StoreParseError(filePath, err.line, err.message);
    }
    throw err;
  }

  const [header, ...body] = records;
  if (!header) return [];

  const missing = STORE_COLUMNS.filter((c) => !header.values.includes(c));
  if (missing.length > 0) {
    throw new StoreParseError(filePath, header.line, `missing columns: ${missing.join(', ')}`);
  }
  const index = new Map(header.values.map((name, i) => [name, i]));

  return body.map((record) => {
    if (record.values.length !== header.values.length) {
      throw new StoreParseError(
        filePath,
        record.line,
        `expected ${String(header.values.length)} fields, got ${String(record.values.length)}`,
      );
    }
    const row = Object.fromEntries(
      STORE_COLUMNS.map((column) => [column, record.values[index.get(column) ?? -1] ?? '']),
    );
    const parsed = storedRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new StoreParseError(filePath, record.line, describeIssue(parsed.error));
    }
    return parsed.data;
  });
}

/**
 * Merge `listings` into the store at `filePath` and rewrite it whole.
 * A store that fails to parse is never overwritten.
 */
export async function writeListingStore(
  filePath: string,
  listings: readonly Listing[],
): Promise<number> {
  const existing = await readListingStore(filePath);

  const unkeyed = listings.filter((l) => l.itemId === undefined).length;
  if (unkeyed > 0) {
    log.warn(`Skipping ${String(unkeyed)} listings without an item id`);
  }

  const merged = mergeListings(existing, listings);
  const rows = [
    [...STORE_COLUMNS],
    ...merged.map((l) => {
      const row = listingToRow(l);
      return STORE_COLUMNS.map((c) => row[c]);
    }),
  ];

  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, stringifyCsv(rows), 'utf-8');
  return merged.length;
}
