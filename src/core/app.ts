import type { BrowserConnection, Connector } from '../browser/connect.js';
import type { SerialSession } from '../browser/serialSession.js';
import { MARKERS, PACING, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { monitorChallenge } from './challengeMonitor.js';
import { EventBus } from './eventBus.js';
import type { InputSource } from './eventBus.js';
import type { AppEvent, Emit } from './events.js';
import { reduce } from './reducer.js';
import type { Effect } from './reducer.js';
import { createInitialState } from './state.js';
import type { AppState, Variant } from './state.js';
import {
  runConnect,
  runEnrichment,
  runExpandIndex,
  runExtractListings,
  runFundsScrape,
  runNavigate,
  runPersist,
  runStatsScrape,
} from './tasks.js';

// ── Public types ─────────────────────────────────────────────

export interface AppOptions {
  variant: Variant;
  targetUrl: string;
  outputPath: string;
  connector: Connector;
  challengeMarker?: string | undefined;
  challengePollMs?: number | undefined;
  enrichDelayMs?: number | undefined;
  elementWaitMs?: number | undefined;
  completeDelayMs?: number | undefined;
  itemPageBase?: string | undefined;
  /** Transaction list read by the stats variant. */
  fundsUrl?: string | undefined;
  /** Redraw rate; 0 disables the ticker. */
  tickRateHz?: number | undefined;
  exitWhenSettled?: boolean | undefined;
  input?: InputSource | undefined;
  /** Called on every tick with the current state. */
  onRender?: ((state: Readonly<AppState>) => void) | undefined;
  /** Called after each event has been reduced. */
  onEvent?: ((event: AppEvent, state: Readonly<AppState>) => void) | undefined;
  sleep?: ((ms: number) => Promise<void>) | undefined;
}

// ── Runtime ──────────────────────────────────────────────────

/**
 * Owns the state, the bus and the browser connection. Pulls one event at a
 * time, reduces it and starts one background task per effect. The loop ends
 * on `quit` or when the bus closes.
 */
export class App {
  readonly state: AppState;
  readonly bus = new EventBus();

  private connection: BrowserConnection | undefined;
  private readonly tasks = new Set<Promise<void>>();
  private readonly emit: Emit = (event) => this.bus.emit(event);

  constructor(private readonly options: AppOptions) {
    this.state = createInitialState({
      variant: options.variant,
      targetUrl: options.targetUrl,
      exitWhenSettled: options.exitWhenSettled,
    });
  }

  async run(): Promise<AppState> {
    this.bus.startTicker(this.options.tickRateHz ?? PACING.TICK_RATE_HZ);
    if (this.options.input) this.bus.attachInput(this.options.input);
    this.emit({ type: 'connect' });

    while (this.state.running) {
      const next = await this.bus.next();
      if (!next) break;
      if (next.kind === 'tick') {
        this.options.onRender?.(this.state);
        continue;
      }
      this.dispatch(next.event);
    }

    await this.shutdown();
    return this.state;
  }

  /** Reduce one event and start the work it asks for. */
  dispatch(event: AppEvent): void {
    if (event.type === 'clientReady') {
      this.connection = event.browser;
    }
    const effects = reduce(this.state, event);
    this.options.onEvent?.(event, this.state);
    for (const effect of effects) {
      this.perform(effect);
    }
  }

  // ── Effects ────────────────────────────────────────────────

  private perform(effect: Effect): void {
    const o = this.options;
    const emit = this.emit;

    switch (effect.type) {
      case 'connect':
        this.spawn('connect', () => runConnect(o.connector, emit));
        return;
      case 'navigate': {
        const { url } = effect;
        this.withSession('navigate', (s) => runNavigate(s, url, emit));
        return;
      }
      case 'monitorChallenge':
        this.withSession('challenge monitor', (s) =>
          monitorChallenge(s, emit, {
            intervalMs: o.challengePollMs ?? PACING.CHALLENGE_POLL,
            marker: o.challengeMarker ?? MARKERS.CHALLENGE,
            sleep: o.sleep,
          }),
        );
        return;
      case 'scrapeStats':
        this.withSession('stats', (s) =>
          runStatsScrape(s, emit, { elementWaitMs: o.elementWaitMs ?? TIMEOUTS.ELEMENT_WAIT }),
        );
        return;
      case 'scrapeFunds':
        this.withSession('funds', (s) =>
          runFundsScrape(s, emit, {
            elementWaitMs: o.elementWaitMs ?? TIMEOUTS.ELEMENT_WAIT,
            fundsUrl: o.fundsUrl,
          }),
        );
        return;
      case 'expandIndex':
        this.withSession('expand index', (s) =>
          runExpandIndex(s, emit, { elementWaitMs: o.elementWaitMs ?? TIMEOUTS.ELEMENT_WAIT }),
        );
        return;
      case 'extractListings':
        this.withSession('extract', (s) => runExtractListings(s, emit));
        return;
      case 'enrich': {
        const { listings } = effect;
        this.withSession('enrich', (s) =>
          runEnrichment(s, listings, emit, {
            delayMs: o.enrichDelayMs,
            itemPageBase: o.itemPageBase,
            sleep: o.sleep,
          }),
        );
        return;
      }
      case 'persist': {
        const { listings } = effect;
        this.spawn('persist', () =>
          runPersist(listings, o.outputPath, emit, {
            completeDelayMs: o.completeDelayMs,
            sleep: o.sleep,
          }),
        );
        return;
      }
      case 'emit':
        emit(effect.event);
        return;
      case 'shutdown':
        this.bus.close();
        return;
    }
  }

  private withSession(name: string, task: (session: SerialSession) => Promise<void>): void {
    const session = this.connection?.session;
    if (!session) {
      log.error(`${name}: no browser session`);
      this.emit({ type: 'navigationFailed', message: 'No browser session' });
      return;
    }
    this.spawn(name, () => task(session));
  }

  private spawn(name: string, task: () => Promise<void>): void {
    const running: Promise<void> = task()
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        log.error(`${name} task failed: ${message}`);
      })
      .finally(() => {
        this.tasks.delete(running);
      });
    this.tasks.add(running);
  }

  // ── Shutdown ───────────────────────────────────────────────

  private async shutdown(): Promise<void> {
    this.bus.close();
    const connection = this.connection;
    this.connection = undefined;
    if (connection) {
      await connection.close();
    }
    await Promise.allSettled([...this.tasks]);
  }
}
