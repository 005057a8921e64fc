import { describe, expect, test } from 'vitest';

import { createInitialState } from '../../core/state.js';
import { emptyListing } from '../../schema/listing.js';
import { progressBar, renderDashboard, renderLoading, renderSummary } from '../dashboard.js';

describe('progressBar', () => {
  test('fills proportionally', () => {
    expect(progressBar(0.5, 10)).toBe('[#####-----] 50%');
    expect(progressBar(1, 4)).toBe('[####] 100%');
  });
});

describe('renderLoading', () => {
  test('asks for help while a challenge is shown', () => {
    const state = createInitialState({ variant: 'inventory', targetUrl: 'https://shop.test/' });
    state.pipeline.waitingForUserInput = true;

    expect(renderLoading(state).at(-1)).toBe(
      '!! Solve the challenge in the browser window to continue',
    );
  });
});

describe('renderDashboard', () => {
  test('marks the selected listing', () => {
    const state = createInitialState({ variant: 'inventory', targetUrl: 'https://shop.test/' });
    state.listings = ['Lamp', 'Mug'].map((title) => {
      const l = emptyListing();
      l.title = title;
      l.price = '$1';
      l.buyItNow = true;
      return l;
    });
    state.selected = 1;

    const lines = renderDashboard(state);
    expect(lines).toContain(`  ${'Lamp'.padEnd(48)} ${'$1'.padEnd(12)} BIN`);
    expect(lines).toContain(`> ${'Mug'.padEnd(48)} ${'$1'.padEnd(12)} BIN`);
  });
});

describe('renderSummary', () => {
  test('lists the run outcome', () => {
    const state = createInitialState({ variant: 'inventory', targetUrl: 'https://shop.test/' });
    state.stats.itemsSold = 12;

    expect(renderSummary(state)).toBe(
      [
        'Result:     idle',
        'Status:     Starting',
        'Feedback:   ?',
        'Items sold: 12',
        'Followers:  ?',
        'Listings:   0',
      ].join('\n') + '\n',
    );
  });

  test('shows the available funds for the stats variant', () => {
    const state = createInitialState({ variant: 'stats', targetUrl: 'https://shop.test/' });
    state.pipeline.stage = 'done';
    state.pipeline.status = 'Seller stats collected';
    state.stats.feedbackScore = '100% positive';
    state.stats.availableFunds = '$1,204.50';

    expect(renderSummary(state)).toBe(
      [
        'Result:     done',
        'Status:     Seller stats collected',
        'Feedback:   100% positive',
        'Items sold: ?',
        'Followers:  ?',
        'Funds:      $1,204.50',
      ].join('\n') + '\n',
    );
  });
});
