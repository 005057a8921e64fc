/**
 * Orchestration module.
 * Event bus, state reducer and the background tasks it starts.
 */

export { App } from './app.js';
export type { AppOptions } from './app.js';
export { EventBus } from './eventBus.js';
export type { InputSource } from './eventBus.js';
export type { AppEvent, AppEventType, BusEvent, Emit } from './events.js';
export { reduce } from './reducer.js';
export type { Effect } from './reducer.js';
export {
  advanceProgress,
  clampSelection,
  createInitialState,
  isSettled,
} from './state.js';
export type { AppState, PipelineState, Section, Stage, Variant, View } from './state.js';
export { ChallengeEdgeDetector, monitorChallenge } from './challengeMonitor.js';
export type { ChallengeSignal } from './challengeMonitor.js';
export { computeOfferPrice, firstOfferCandidate, parsePriceText, runOfferSweep } from './offers.js';
export type { OfferSweepOptions, OfferSweepResult } from './offers.js';
