import type { BrowserConnection } from '../browser/connect.js';
import type { ConnectStage } from '../browser/errors.js';
import type { Listing } from '../schema/listing.js';

// ── Application events ───────────────────────────────────────
// Closed union of every signal the reducer understands. Background tasks
// talk to the state only through these.

export type AppEvent =
  | { type: 'quit' }
  | { type: 'connect' }
  | { type: 'clientReady'; browser: BrowserConnection }
  | { type: 'connectFailed'; stage: ConnectStage; message: string }
  | { type: 'setProgress'; progress: number; message: string }
  | { type: 'init'; url: string }
  | { type: 'navigationComplete' }
  | { type: 'navigationFailed'; message: string }
  | { type: 'challengeDetected' }
  | { type: 'challengeResolved' }
  | { type: 'scrapeFeedback'; text: string }
  | { type: 'scrapeItemsSold'; count: number }
  | { type: 'scrapeFollowerCount'; count: number }
  | { type: 'statsComplete' }
  | { type: 'scrapeFunds'; text: string }
  | { type: 'fundsComplete' }
  | { type: 'clickSeeAll' }
  | { type: 'extractListings' }
  | { type: 'scrapeListings'; listings: Listing[] }
  | { type: 'enrichListings' }
  | { type: 'enrichedListings'; listings: Listing[] }
  | { type: 'listingsPersisted'; count: number; path: string }
  | { type: 'persistFailed'; message: string }
  | { type: 'scrapingComplete' }
  // UI
  | { type: 'selectNext' }
  | { type: 'selectPrevious' }
  | { type: 'selectFirst' }
  | { type: 'selectLast' }
  | { type: 'toggleLock' }
  | { type: 'switchSection' }
  | { type: 'toggleView' };

export type AppEventType = AppEvent['type'];

/** Returns false when the bus is closed and the event was dropped. */
export type Emit = (event: AppEvent) => boolean;

// ── Bus envelope ─────────────────────────────────────────────

export type BusEvent =
  | { kind: 'tick' }
  | { kind: 'input'; event: AppEvent }
  | { kind: 'app'; event: AppEvent };
