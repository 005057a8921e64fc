import { PACING } from '../config/defaults.js';
import type { AppEvent, BusEvent } from './events.js';

/**
 * Subscribes to an external input source. `deliver` receives already-mapped
 * application events; the returned function detaches the source.
 */
export type InputSource = (deliver: (event: AppEvent) => void) => () => void;

/**
 * Unbounded FIFO shared by many producers and consumed by the run loop.
 *
 * Ticks coalesce: while one tick waits in the queue further ticks are
 * dropped, so a slow consumer never builds a redraw backlog. After
 * `close()` every send is dropped and `next()` resolves `undefined`.
 */
export class EventBus {
  private readonly queue: BusEvent[] = [];
  private waiter: ((event: BusEvent | undefined) => void) | undefined;
  private tickPending = false;
  private closed = false;
  private ticker: NodeJS.Timeout | undefined;
  private detachInput: (() => void) | undefined;

  send(event: BusEvent): boolean {
    if (this.closed) return false;
    if (event.kind === 'tick') {
      if (this.tickPending) return false;
      this.tickPending = true;
    }
    this.queue.push(event);
    this.wake();
    return true;
  }

  emit(event: AppEvent): boolean {
    return this.send({ kind: 'app', event });
  }

  next(): Promise<BusEvent | undefined> {
    const head = this.take();
    if (head) return Promise.resolve(head);
    if (this.closed) return Promise.resolve(undefined);
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  get pending(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  startTicker(hz: number = PACING.TICK_RATE_HZ): void {
    if (this.ticker || this.closed || hz <= 0) return;
    this.ticker = setInterval(() => {
      this.send({ kind: 'tick' });
    }, Math.max(Math.round(1000 / hz), 1));
  }

  attachInput(source: InputSource): void {
    this.detachInput?.();
    this.detachInput = source((event) => {
      this.send({ kind: 'input', event });
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.ticker) clearInterval(this.ticker);
    this.ticker = undefined;
    this.detachInput?.();
    this.detachInput = undefined;
    this.queue.length = 0;
    this.tickPending = false;

    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.(undefined);
  }

  // ── Internals ──────────────────────────────────────────────

  private take(): BusEvent | undefined {
    const head = this.queue.shift();
    if (head?.kind === 'tick') this.tickPending = false;
    return head;
  }

  private wake(): void {
    const waiter = this.waiter;
    if (!waiter) return;
    const head = this.take();
    if (!head) return;
    this.waiter = undefined;
    waiter(head);
  }
}
