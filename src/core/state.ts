import { LIMITS } from '../config/defaults.js';
import type { Listing, SellerStats } from '../schema/listing.js';

// ── Types ────────────────────────────────────────────────────

export type Stage =
  | 'idle'
  | 'connecting'
  | 'navigating'
  | 'awaitingChallengeClearance'
  | 'scrapingStats'
  | 'expandingListingIndex'
  | 'extractingListings'
  | 'enriching'
  | 'persisting'
  | 'done'
  | 'failed';

/** Which pipeline runs after the seller card is read. */
export type Variant = 'inventory' | 'stats';

export type View = 'loading' | 'dashboard';
export type Section = 'stats' | 'listings';

export interface PipelineState {
  /** 0..1, never decreases within a run. */
  progress: number;
  status: string;
  captchaDetected: boolean;
  waitingForUserInput: boolean;
  stage: Stage;
}

export interface AppState {
  running: boolean;
  variant: Variant;
  targetUrl: string;
  /** Emit `quit` once the run reaches `done` or `failed`. */
  exitWhenSettled: boolean;
  stats: SellerStats;
  pipeline: PipelineState;
  listings: Listing[];
  selected: number;
  // UI only
  view: View;
  section: Section;
  locked: boolean;
  scroll: number;
}

export interface InitialStateOptions {
  variant: Variant;
  targetUrl: string;
  exitWhenSettled?: boolean | undefined;
}

// ── Construction ─────────────────────────────────────────────

export function createInitialState(options: InitialStateOptions): AppState {
  return {
    running: true,
    variant: options.variant,
    targetUrl: options.targetUrl,
    exitWhenSettled: options.exitWhenSettled ?? false,
    stats: { feedbackScore: '' },
    pipeline: {
      progress: 0,
      status: 'Starting',
      captchaDetected: false,
      waitingForUserInput: false,
      stage: 'idle',
    },
    listings: [],
    selected: 0,
    view: 'loading',
    section: 'listings',
    locked: false,
    scroll: 0,
  };
}

// ── Helpers ──────────────────────────────────────────────────

/** Move progress forward to `value`; a lower value is ignored. */
export function advanceProgress(pipeline: PipelineState, value: number): void {
  const bounded = Math.min(Math.max(value, 0), 1);
  pipeline.progress = Math.max(pipeline.progress, bounded);
}

/** Keep `selected` inside the collection and the scroll window around it. */
export function clampSelection(state: AppState, rows: number = LIMITS.DASHBOARD_ROWS): void {
  const count = state.listings.length;
  state.selected = count === 0 ? 0 : Math.min(Math.max(state.selected, 0), count - 1);

  if (state.selected < state.scroll) {
    state.scroll = state.selected;
  } else if (state.selected >= state.scroll + rows) {
    state.scroll = state.selected - rows + 1;
  }
  state.scroll = Math.max(0, Math.min(state.scroll, Math.max(count - rows, 0)));
}

export function isSettled(stage: Stage): boolean {
  return stage === 'done' || stage === 'failed';
}
