import { LIMITS } from '../config/defaults.js';
import type { AppState } from '../core/state.js';
import type { Listing } from '../schema/listing.js';

// ── Helpers ──────────────────────────────────────────────────

const BAR_WIDTH = 30;

export function progressBar(progress: number, width: number = BAR_WIDTH): string {
  const filled = Math.round(Math.min(Math.max(progress, 0), 1) * width);
  const percent = Math.round(progress * 100);
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}] ${String(percent)}%`;
}

function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 1)}…`;
}

function formatCount(value: number | undefined): string {
  return value === undefined ? '?' : String(value);
}

function listingRow(listing: Listing, selected: boolean): string {
  const marker = selected ? '>' : ' ';
  const flags = [
    listing.buyItNow ? 'BIN' : '',
    listing.acceptsOffers ? 'OBO' : '',
    listing.isNewListing ? 'NEW' : '',
  ]
    .filter(Boolean)
    .join(' ');
  return `${marker} ${truncate(listing.title, 48).padEnd(48)} ${listing.price.padEnd(12)} ${flags}`;
}

// ── Frames ───────────────────────────────────────────────────

/** Loading view: stage, status and the progress bar. */
export function renderLoading(state: Readonly<AppState>): string[] {
  const p = state.pipeline;
  const lines = [
    `shelfscan  ${state.targetUrl}`,
    '',
    `Stage:   ${p.stage}`,
    `Status:  ${p.status}`,
    progressBar(p.progress),
  ];
  if (p.waitingForUserInput) {
    lines.push('', '!! Solve the challenge in the browser window to continue');
  }
  return lines;
}

/** Dashboard view: seller stats and a scrolled window over the listings. */
export function renderDashboard(
  state: Readonly<AppState>,
  rows: number = LIMITS.DASHBOARD_ROWS,
): string[] {
  const lines: string[] = [];
  const focus = (section: AppState['section']): string =>
    state.section === section ? '*' : ' ';

  lines.push(`${focus('stats')} Seller stats${state.locked ? '  [locked]' : ''}`);
  lines.push(`  Feedback:   ${state.stats.feedbackScore || '?'}`);
  lines.push(`  Items sold: ${formatCount(state.stats.itemsSold)}`);
  lines.push(`  Followers:  ${formatCount(state.stats.followerCount)}`);
  if (state.stats.availableFunds !== undefined) {
    lines.push(`  Funds:      ${state.stats.availableFunds}`);
  }
  lines.push('');

  const total = state.listings.length;
  lines.push(`${focus('listings')} Listings (${String(total)})`);
  const visible = state.listings.slice(state.scroll, state.scroll + rows);
  visible.forEach((listing, i) => {
    lines.push(listingRow(listing, state.scroll + i === state.selected));
  });

  const current = state.listings[state.selected];
  if (current) {
    lines.push('');
    lines.push(`  ${current.title}`);
    lines.push(`  ${current.price} ${current.shipping} ${current.condition}`.trimEnd());
    if (current.watchers !== undefined) {
      lines.push(`  Watchers: ${String(current.watchers)}`);
    }
    for (const spec of current.itemSpecifics.slice(0, 5)) {
      lines.push(`  - ${spec}`);
    }
    if (current.url) lines.push(`  ${current.url}`);
  }

  lines.push('');
  lines.push(`Status: ${state.pipeline.status}`);
  return lines;
}

export function renderFrame(state: Readonly<AppState>): string {
  const lines = state.view === 'dashboard' ? renderDashboard(state) : renderLoading(state);
  return lines.join('\n');
}

// ── Summary ──────────────────────────────────────────────────

/** Plain-text end-of-run summary for non-interactive commands. */
export function renderSummary(state: Readonly<AppState>): string {
  const lines = [
    `Result:     ${state.pipeline.stage}`,
    `Status:     ${state.pipeline.status}`,
    `Feedback:   ${state.stats.feedbackScore || '?'}`,
    `Items sold: ${formatCount(state.stats.itemsSold)}`,
    `Followers:  ${formatCount(state.stats.followerCount)}`,
  ];
  if (state.variant === 'inventory') {
    lines.push(`Listings:   ${String(state.listings.length)}`);
  } else {
    lines.push(`Funds:      ${state.stats.availableFunds ?? '?'}`);
  }
  return lines.join('\n') + '\n';
}
