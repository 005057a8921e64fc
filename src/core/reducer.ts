import { PROGRESS } from '../config/defaults.js';
import type { Listing } from '../schema/listing.js';
import type { AppEvent } from './events.js';
import { advanceProgress, clampSelection, isSettled } from './state.js';
import type { AppState, Stage } from './state.js';

// ── Effects ──────────────────────────────────────────────────
// What the runtime must start after an event was applied. Each effect
// becomes at most one background task.

export type Effect =
  | { type: 'connect' }
  | { type: 'navigate'; url: string }
  | { type: 'monitorChallenge' }
  | { type: 'scrapeStats' }
  | { type: 'scrapeFunds' }
  | { type: 'expandIndex' }
  | { type: 'extractListings' }
  | { type: 'enrich'; listings: Listing[] }
  | { type: 'persist'; listings: Listing[] }
  | { type: 'emit'; event: AppEvent }
  | { type: 'shutdown' };

// ── Reducer ──────────────────────────────────────────────────

/**
 * Apply one event to the state and return the work it triggers.
 * The only place `AppState` is ever written.
 */
export function reduce(state: AppState, event: AppEvent): Effect[] {
  const pipeline = state.pipeline;

  switch (event.type) {
    case 'quit':
      state.running = false;
      return [{ type: 'shutdown' }];

    case 'connect':
      enter(state, 'connecting', 'Launching browser');
      advanceProgress(pipeline, PROGRESS.CONNECTING);
      return [{ type: 'connect' }];

    case 'clientReady':
      pipeline.status = 'Browser connected';
      advanceProgress(pipeline, PROGRESS.CLIENT_READY);
      return [{ type: 'emit', event: { type: 'init', url: state.targetUrl } }];

    case 'connectFailed':
      return fail(state, `Could not start browser (${event.stage}): ${event.message}`);

    case 'setProgress':
      advanceProgress(pipeline, event.progress);
      pipeline.status = event.message;
      return [];

    case 'init':
      state.targetUrl = event.url;
      enter(state, 'navigating', `Opening ${event.url}`);
      return [{ type: 'navigate', url: event.url }];

    case 'navigationComplete':
      enter(state, 'awaitingChallengeClearance', 'Checking for a challenge page');
      advanceProgress(pipeline, PROGRESS.NAVIGATED);
      return [{ type: 'monitorChallenge' }];

    case 'navigationFailed':
      return fail(state, `Navigation failed: ${event.message}`);

    case 'challengeDetected':
      pipeline.captchaDetected = true;
      pipeline.waitingForUserInput = true;
      pipeline.status = 'Challenge detected: solve it in the browser window';
      return [];

    case 'challengeResolved':
      pipeline.captchaDetected = false;
      pipeline.waitingForUserInput = false;
      if (pipeline.stage !== 'awaitingChallengeClearance') return [];
      enter(state, 'scrapingStats', 'Reading seller stats');
      advanceProgress(pipeline, PROGRESS.CHALLENGE_CLEARED);
      return [{ type: 'scrapeStats' }];

    case 'scrapeFeedback':
      state.stats.feedbackScore = event.text;
      advanceProgress(pipeline, pipeline.progress + PROGRESS.STAT_INCREMENT);
      return [];

    case 'scrapeItemsSold':
      state.stats.itemsSold = event.count;
      advanceProgress(pipeline, pipeline.progress + PROGRESS.STAT_INCREMENT);
      return [];

    case 'scrapeFollowerCount':
      state.stats.followerCount = event.count;
      advanceProgress(pipeline, pipeline.progress + PROGRESS.STAT_INCREMENT);
      return [];

    case 'statsComplete':
      if (state.variant === 'stats') {
        pipeline.status = 'Reading available funds';
        return [{ type: 'scrapeFunds' }];
      }
      return [{ type: 'emit', event: { type: 'clickSeeAll' } }];

    case 'scrapeFunds':
      state.stats.availableFunds = event.text;
      advanceProgress(pipeline, pipeline.progress + PROGRESS.STAT_INCREMENT);
      return [];

    case 'fundsComplete':
      if (pipeline.stage !== 'scrapingStats') return [];
      enter(state, 'done', 'Seller stats collected');
      advanceProgress(pipeline, PROGRESS.COMPLETE);
      return [{ type: 'emit', event: { type: 'scrapingComplete' } }];

    case 'clickSeeAll':
      enter(state, 'expandingListingIndex', 'Opening the full listing index');
      return [{ type: 'expandIndex' }];

    case 'extractListings':
      enter(state, 'extractingListings', 'Extracting listings');
      advanceProgress(pipeline, PROGRESS.INDEX_EXPANDED);
      return [{ type: 'extractListings' }];

    case 'scrapeListings':
      state.listings = event.listings;
      state.selected = 0;
      state.scroll = 0;
      pipeline.status = `Found ${String(event.listings.length)} listings`;
      advanceProgress(pipeline, PROGRESS.EXTRACTED);
      return [{ type: 'emit', event: { type: 'enrichListings' } }];

    case 'enrichListings':
      enter(state, 'enriching', 'Enriching listings');
      return [{ type: 'enrich', listings: structuredClone(state.listings) }];

    case 'enrichedListings':
      state.listings = event.listings;
      clampSelection(state);
      enter(state, 'persisting', 'Saving listings');
      advanceProgress(pipeline, PROGRESS.COMPLETE);
      return [{ type: 'persist', listings: event.listings }];

    case 'listingsPersisted':
      pipeline.status = `Saved ${String(event.count)} listings to ${event.path}`;
      return [];

    case 'persistFailed':
      return fail(state, `Could not save listings: ${event.message}`);

    case 'scrapingComplete':
      if (pipeline.stage !== 'failed') pipeline.stage = 'done';
      state.view = 'dashboard';
      return settle(state);

    // ── UI ───────────────────────────────────────────────────

    case 'selectNext':
      return select(state, state.selected + 1);

    case 'selectPrevious':
      return select(state, state.selected - 1);

    case 'selectFirst':
      return select(state, 0);

    case 'selectLast':
      return select(state, state.listings.length - 1);

    case 'toggleLock':
      state.locked = !state.locked;
      return [];

    case 'switchSection':
      if (!state.locked) {
        state.section = state.section === 'stats' ? 'listings' : 'stats';
      }
      return [];

    case 'toggleView':
      state.view = state.view === 'dashboard' ? 'loading' : 'dashboard';
      return [];
  }
}

// ── Helpers ──────────────────────────────────────────────────

function enter(state: AppState, stage: Stage, status: string): void {
  state.pipeline.stage = stage;
  state.pipeline.status = status;
}

function fail(state: AppState, status: string): Effect[] {
  enter(state, 'failed', status);
  return settle(state);
}

function settle(state: AppState): Effect[] {
  if (state.exitWhenSettled && isSettled(state.pipeline.stage)) {
    return [{ type: 'emit', event: { type: 'quit' } }];
  }
  return [];
}

function select(state: AppState, index: number): Effect[] {
  if (state.section !== 'listings') return [];
  state.selected = index;
  clampSelection(state);
  return [];
}
