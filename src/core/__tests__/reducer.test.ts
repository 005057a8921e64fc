import { describe, expect, test } from 'vitest';

import { FakeSession, fakeConnection } from '../../__tests__/helpers/fakeSession.js';
import { emptyListing } from '../../schema/listing.js';
import type { Listing } from '../../schema/listing.js';
import { reduce } from '../reducer.js';
import { advanceProgress, clampSelection, createInitialState } from '../state.js';
import type { AppState } from '../state.js';

const STORE = 'https://shop.test/str/acme';

function listings(count: number): Listing[] {
  return Array.from({ length: count }, (_, i) => {
    const l = emptyListing();
    l.itemId = String(100 + i);
    l.title = `Item ${String(i)}`;
    l.price = '$1';
    return l;
  });
}

function state(overrides: Partial<AppState> = {}): AppState {
  return { ...createInitialState({ variant: 'inventory', targetUrl: STORE }), ...overrides };
}

describe('stage transitions', () => {
  test('connect starts the connect task', () => {
    const s = state();
    expect(reduce(s, { type: 'connect' })).toEqual([{ type: 'connect' }]);
    expect(s.pipeline.stage).toBe('connecting');
    expect(s.pipeline.progress).toBe(0.05);
  });

  test('clientReady asks for navigation to the target', () => {
    const s = state();
    const browser = fakeConnection(new FakeSession());
    expect(reduce(s, { type: 'clientReady', browser })).toEqual([
      { type: 'emit', event: { type: 'init', url: STORE } },
    ]);
  });

  test('connectFailed ends the run', () => {
    const s = state();
    expect(reduce(s, { type: 'connectFailed', stage: 'driver', message: 'spawn ENOENT' })).toEqual([]);
    expect(s.pipeline.stage).toBe('failed');
    expect(s.pipeline.status).toBe('Could not start browser (driver): spawn ENOENT');
  });

  test('a settled run quits when asked to', () => {
    const s = state({ exitWhenSettled: true });
    expect(reduce(s, { type: 'navigationFailed', message: 'timeout' })).toEqual([
      { type: 'emit', event: { type: 'quit' } },
    ]);
    expect(s.pipeline.status).toBe('Navigation failed: timeout');
  });

  test('challenge flags are raised and cleared', () => {
    const s = state();
    reduce(s, { type: 'navigationComplete' });
    reduce(s, { type: 'challengeDetected' });
    expect(s.pipeline.captchaDetected).toBe(true);
    expect(s.pipeline.waitingForUserInput).toBe(true);

    expect(reduce(s, { type: 'challengeResolved' })).toEqual([{ type: 'scrapeStats' }]);
    expect(s.pipeline.captchaDetected).toBe(false);
    expect(s.pipeline.waitingForUserInput).toBe(false);
    expect(s.pipeline.stage).toBe('scrapingStats');
  });

  test('a late resolution outside the clearance stage starts nothing', () => {
    const s = state();
    s.pipeline.stage = 'enriching';
    expect(reduce(s, { type: 'challengeResolved' })).toEqual([]);
    expect(s.pipeline.stage).toBe('enriching');
  });

  test('stats events fill the card and add progress', () => {
    const s = state();
    s.pipeline.progress = 0.25;
    reduce(s, { type: 'scrapeItemsSold', count: 1200 });
    reduce(s, { type: 'scrapeFeedback', text: '99.8% positive feedback' });
    reduce(s, { type: 'scrapeFollowerCount', count: 345 });

    expect(s.stats).toEqual({
      feedbackScore: '99.8% positive feedback',
      itemsSold: 1200,
      followerCount: 345,
    });
    expect(s.pipeline.progress).toBeCloseTo(0.4);
  });

  test('statsComplete branches on the variant', () => {
    const inventory = state();
    expect(reduce(inventory, { type: 'statsComplete' })).toEqual([
      { type: 'emit', event: { type: 'clickSeeAll' } },
    ]);

    const stats = createInitialState({ variant: 'stats', targetUrl: STORE });
    stats.pipeline.stage = 'scrapingStats';
    expect(reduce(stats, { type: 'statsComplete' })).toEqual([{ type: 'scrapeFunds' }]);
    expect(stats.pipeline.stage).toBe('scrapingStats');
    expect(stats.pipeline.status).toBe('Reading available funds');
  });

  test('the funds read finishes the stats variant', () => {
    const s = createInitialState({ variant: 'stats', targetUrl: STORE });
    s.pipeline.stage = 'scrapingStats';
    s.pipeline.progress = 0.4;

    expect(reduce(s, { type: 'scrapeFunds', text: '$1,204.50' })).toEqual([]);
    expect(s.stats.availableFunds).toBe('$1,204.50');
    expect(s.pipeline.progress).toBeCloseTo(0.45);

    expect(reduce(s, { type: 'fundsComplete' })).toEqual([
      { type: 'emit', event: { type: 'scrapingComplete' } },
    ]);
    expect(s.pipeline.stage).toBe('done');
    expect(s.pipeline.progress).toBe(1);
  });

  test('a funds completion after a failure changes nothing', () => {
    const s = createInitialState({ variant: 'stats', targetUrl: STORE });
    s.pipeline.stage = 'failed';

    expect(reduce(s, { type: 'fundsComplete' })).toEqual([]);
    expect(s.pipeline.stage).toBe('failed');
  });

  test('scraped listings replace the collection and start enrichment', () => {
    const s = state({ listings: listings(5), selected: 4 });
    const fresh = listings(2);

    expect(reduce(s, { type: 'scrapeListings', listings: fresh })).toEqual([
      { type: 'emit', event: { type: 'enrichListings' } },
    ]);
    expect(s.listings).toBe(fresh);
    expect(s.selected).toBe(0);
  });

  test('enrichment works on a snapshot', () => {
    const s = state({ listings: listings(1) });
    const [effect] = reduce(s, { type: 'enrichListings' });

    expect(effect?.type).toBe('enrich');
    if (effect?.type !== 'enrich') return;
    expect(effect.listings).toEqual(s.listings);
    expect(effect.listings).not.toBe(s.listings);
  });

  test('enriched listings are persisted at full progress', () => {
    const s = state();
    const enriched = listings(2);
    expect(reduce(s, { type: 'enrichedListings', listings: enriched })).toEqual([
      { type: 'persist', listings: enriched },
    ]);
    expect(s.pipeline.stage).toBe('persisting');
    expect(s.pipeline.progress).toBe(1);
  });

  test('a failed save keeps the run failed after completion', () => {
    const s = state();
    reduce(s, { type: 'persistFailed', message: 'disk full' });
    reduce(s, { type: 'scrapingComplete' });

    expect(s.pipeline.stage).toBe('failed');
    expect(s.view).toBe('dashboard');
  });

  test('quit stops the loop', () => {
    const s = state();
    expect(reduce(s, { type: 'quit' })).toEqual([{ type: 'shutdown' }]);
    expect(s.running).toBe(false);
  });
});

describe('progress', () => {
  test('never decreases', () => {
    const s = state();
    reduce(s, { type: 'setProgress', progress: 0.6, message: 'a' });
    reduce(s, { type: 'setProgress', progress: 0.3, message: 'b' });
    reduce(s, { type: 'connect' });

    expect(s.pipeline.progress).toBe(0.6);
    expect(s.pipeline.status).toBe('Launching browser');
  });

  test('is bounded to 0..1', () => {
    const s = state();
    advanceProgress(s.pipeline, 1.7);
    expect(s.pipeline.progress).toBe(1);
  });
});

describe('selection', () => {
  test('clamps to the last listing when the collection shrinks', () => {
    const s = state({ listings: listings(10), selected: 8 });
    reduce(s, { type: 'enrichedListings', listings: listings(3) });
    expect(s.selected).toBe(2);
  });

  test('is zero for an empty collection', () => {
    const s = state({ listings: [], selected: 4 });
    clampSelection(s);
    expect(s.selected).toBe(0);
  });

  test('moves within bounds', () => {
    const s = state({ listings: listings(3) });
    reduce(s, { type: 'selectPrevious' });
    expect(s.selected).toBe(0);
    reduce(s, { type: 'selectLast' });
    expect(s.selected).toBe(2);
    reduce(s, { type: 'selectNext' });
    expect(s.selected).toBe(2);
    reduce(s, { type: 'selectFirst' });
    expect(s.selected).toBe(0);
  });

  test('scrolls to keep the selection visible', () => {
    const s = state({ listings: listings(40) });
    reduce(s, { type: 'selectLast' });
    expect(s.scroll).toBe(25);
    reduce(s, { type: 'selectFirst' });
    expect(s.scroll).toBe(0);
  });

  test('ignores navigation while the stats section has focus', () => {
    const s = state({ listings: listings(3) });
    reduce(s, { type: 'switchSection' });
    reduce(s, { type: 'selectNext' });
    expect(s.section).toBe('stats');
    expect(s.selected).toBe(0);
  });

  test('lock pins the current section', () => {
    const s = state();
    reduce(s, { type: 'toggleLock' });
    reduce(s, { type: 'switchSection' });
    expect(s.locked).toBe(true);
    expect(s.section).toBe('listings');
  });
});
