import type { AutomationSession } from './session.js';

/**
 * Single access point for a shared automation session.
 *
 * Callbacks passed to `exclusive` run strictly one after another in the
 * order they were submitted. A callback owns the page for its whole
 * duration, so a navigate-then-read sequence cannot be split by another
 * task's navigation.
 */
export class SerialSession {
  private tail: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(private readonly session: AutomationSession) {}

  exclusive<T>(fn: (session: AutomationSession) => Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new Error('Browser session is closed'));
    }

    const result = this.tail.then(() => fn(this.session));
    // Keep the chain alive whatever the outcome; callers see the rejection.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Refuse new work and close the session immediately. In-flight callbacks
   * are not awaited: they fail on their next call against the closed page.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.session.close();
  }
}
