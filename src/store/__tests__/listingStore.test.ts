import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { emptyListing } from '../../schema/listing.js';
import type { Listing } from '../../schema/listing.js';
import { setLogSink } from '../../utils/logger.js';
import {
  STORE_COLUMNS,
  StoreParseError,
  mergeListings,
  readListingStore,
  writeListingStore,
} from '../listingStore.js';

function listing(itemId: string | undefined, price: string, title = `Item ${itemId ?? '?'}`): Listing {
  const l = emptyListing();
  if (itemId !== undefined) l.itemId = itemId;
  l.title = title;
  l.price = price;
  return l;
}

let dir: string;
let logLines: string[];

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'shelfscan-store-'));
  logLines = [];
  setLogSink((line) => logLines.push(line));
});

afterEach(async () => {
  setLogSink();
  await rm(dir, { recursive: true, force: true });
});

describe('mergeListings', () => {
  test('keeps existing order, replaces in place and appends new ids', () => {
    const merged = mergeListings(
      [listing('1', '$1'), listing('2', '$2')],
      [listing('3', '$3'), listing('1', '$9')],
    );
    expect(merged.map((l) => [l.itemId, l.price])).toEqual([
      ['1', '$9'],
      ['2', '$2'],
      ['3', '$3'],
    ]);
  });

  test('leaves out listings without an id', () => {
    expect(mergeListings([], [listing(undefined, '$1')])).toEqual([]);
  });
});

describe('writeListingStore', () => {
  test('overlays a new scrape onto the existing store', async () => {
    const file = path.join(dir, 'listings.csv');
    await writeListingStore(file, [listing('111', '$10')]);

    const count = await writeListingStore(file, [listing('111', '$12'), listing('222', '$5')]);

    expect(count).toBe(2);
    const stored = await readListingStore(file);
    expect(stored.map((l) => [l.itemId, l.price])).toEqual([
      ['111', '$12'],
      ['222', '$5'],
    ]);
  });

  test('is idempotent for identical listings', async () => {
    const file = path.join(dir, 'listings.csv');
    await writeListingStore(file, [listing('111', '$10')]);
    const first = await readFile(file, 'utf-8');

    await writeListingStore(file, [listing('111', '$10')]);

    expect(await readFile(file, 'utf-8')).toBe(first);
    expect(await readListingStore(file)).toHaveLength(1);
  });

  test('writes the fixed header and serializes every field', async () => {
    const file = path.join(dir, 'nested', 'out.csv');
    const full = listing('42', '$3.50', 'Mug, "large"');
    full.watchers = 7;
    full.buyItNow = true;
    full.notes = ['Last one', 'Free returns'];
    full.itemSpecifics = ['Brand: Acme', 'Color: Blue'];
    full.description = 'Line one\nLine two';

    await writeListingStore(file, [full]);

    const text = await readFile(file, 'utf-8');
    const [header] = text.split('\n');
    expect(header).toBe(STORE_COLUMNS.join(','));
    expect(await readListingStore(file)).toEqual([full]);
  });

  test('keeps separators inside list entries', async () => {
    const file = path.join(dir, 'listings.csv');
    const item = listing('7', '$7');
    item.itemSpecifics = ['Material: Cotton; Polyester', 'Brand: Acme'];
    item.notes = ['Path C:\\box'];

    await writeListingStore(file, [item]);
    await writeListingStore(file, [listing('8', '$8')]);

    const [stored] = await readListingStore(file);
    expect(stored?.itemSpecifics).toEqual(['Material: Cotton; Polyester', 'Brand: Acme']);
    expect(stored?.notes).toEqual(['Path C:\\box']);
  });

  test('skips listings without an item id and says so', async () => {
    const file = path.join(dir, 'listings.csv');

    const count = await writeListingStore(file, [listing(undefined, '$1'), listing('5', '$5')]);

    expect(count).toBe(1);
    expect(logLines).toContain('⚠️  Skipping 1 listings without an item id');
  });

  test('refuses to overwrite a malformed store', async () => {
    const file = path.join(dir, 'listings.csv');
    const broken = `${STORE_COLUMNS.join(',')}\nonly,three,fields\n`;
    await writeFile(file, broken, 'utf-8');

    await expect(writeListingStore(file, [listing('1', '$1')])).rejects.toThrow(StoreParseError);
    expect(await readFile(file, 'utf-8')).toBe(broken);
  });
});

describe('readListingStore', () => {
  test('treats a missing file as an empty store', async () => {
    expect(await readListingStore(path.join(dir, 'absent.csv'))).toEqual([]);
  });

  test('reports the line of a bad boolean', async () => {
    const file = path.join(dir, 'listings.csv');
    const values = STORE_COLUMNS.map((c) => (c === 'buy_it_now' ? 'yes' : ''));
    await writeFile(file, `${STORE_COLUMNS.join(',')}\n${values.join(',')}\n`, 'utf-8');

    await expect(readListingStore(file)).rejects.toThrow(
      `${file}:2: column buy_it_now: expected true or false, got "yes"`,
    );
  });

  test('reports the line of a bad count', async () => {
    const file = path.join(dir, 'listings.csv');
    const good = STORE_COLUMNS.map((c) => (c === 'item_id' ? '1' : ''));
    const bad = STORE_COLUMNS.map((c) => (c === 'watchers' ? '3k' : ''));
    await writeFile(
      file,
      `${STORE_COLUMNS.join(',')}\n${good.join(',')}\n${bad.join(',')}\n`,
      'utf-8',
    );

    await expect(readListingStore(file)).rejects.toThrow(
      `${file}:3: column watchers: expected a whole number`,
    );
  });

  test('reads empty optional columns as absent', async () => {
    const file = path.join(dir, 'listings.csv');
    const values = STORE_COLUMNS.map((c) => (c === 'title' ? 'Lamp' : ''));
    await writeFile(file, `${STORE_COLUMNS.join(',')}\n${values.join(',')}\n`, 'utf-8');

    const [stored] = await readListingStore(file);
    expect(stored?.title).toBe('Lamp');
    expect(stored?.itemId).toBeUndefined();
    expect(stored?.watchers).toBeUndefined();
    expect(stored?.buyItNow).toBe(false);
    expect(stored?.itemSpecifics).toEqual([]);
  });

  test('rejects a header with missing columns', async () => {
    const file = path.join(dir, 'listings.csv');
    await writeFile(file, 'title,price\nA,$1\n', 'utf-8');

    await expect(readListingStore(file)).rejects.toThrow(StoreParseError);
  });
});
