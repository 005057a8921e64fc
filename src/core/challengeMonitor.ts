import { MARKERS, PACING } from '../config/defaults.js';
import type { SerialSession } from '../browser/serialSession.js';
import * as log from '../utils/logger.js';
import { sleep } from '../utils/timing.js';
import type { Emit } from './events.js';

export type ChallengeSignal = 'detected' | 'resolved';

/**
 * Edge detector over a sequence of observed URLs.
 *
 * - marked after clear (or at the first poll) → `detected`, once
 * - clear after marked, or clear at the first poll → `resolved`, then finished
 */
export class ChallengeEdgeDetector {
  private readonly marker: string;
  private marked: boolean | undefined;
  private done = false;

  constructor(marker: string = MARKERS.CHALLENGE) {
    this.marker = marker.toLowerCase();
  }

  get finished(): boolean {
    return this.done;
  }

  observe(url: string): ChallengeSignal | null {
    if (this.done) return null;

    const marked = url.toLowerCase().includes(this.marker);
    const previous = this.marked;
    this.marked = marked;

    if (!marked) {
      this.done = true;
      return 'resolved';
    }
    return previous === true ? null : 'detected';
  }
}

export interface ChallengeMonitorOptions {
  intervalMs?: number | undefined;
  marker?: string | undefined;
  sleep?: ((ms: number) => Promise<void>) | undefined;
}

/**
 * One-shot watcher for the page just navigated to. Polls the current URL
 * until the challenge is clear, emitting edge events on the way. A failed
 * poll ends the watch with `navigationFailed`.
 */
export async function monitorChallenge(
  session: SerialSession,
  emit: Emit,
  options: ChallengeMonitorOptions = {},
): Promise<void> {
  const detector = new ChallengeEdgeDetector(options.marker);
  const pause = options.sleep ?? sleep;
  const intervalMs = options.intervalMs ?? PACING.CHALLENGE_POLL;

  while (!detector.finished) {
    let url: string;
    try {
      url = await session.exclusive((s) => s.currentUrl());
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.warn(`Challenge monitor stopped: ${message}`);
      emit({ type: 'navigationFailed', message });
      return;
    }

    const signal = detector.observe(url);
    if (signal === 'resolved') {
      emit({ type: 'challengeResolved' });
      return;
    }
    if (signal === 'detected') {
      log.challenge('Challenge page detected, waiting for it to be solved in the browser');
      emit({ type: 'challengeDetected' });
    }

    await pause(intervalMs);
  }
}
