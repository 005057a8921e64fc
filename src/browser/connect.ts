import { PACING, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { sleep } from '../utils/timing.js';
import { launchDriver } from './driver.js';
import type { DriverOptions, DriverProcess } from './driver.js';
import { ConnectError } from './errors.js';
import { attachSession } from './playwrightSession.js';
import { SerialSession } from './serialSession.js';
import type { AutomationSession } from './session.js';

// ── Public types ─────────────────────────────────────────────

/** A supervised browser process plus the serialized session attached to it. */
export interface BrowserConnection {
  readonly session: SerialSession;
  /** Best-effort close of the session, then termination of the process. */
  close(): Promise<void>;
}

export type Connector = () => Promise<BrowserConnection>;

export interface ConnectOptions extends DriverOptions {
  connectDeadlineMs?: number | undefined;
  attach?: ((endpoint: string, timeoutMs: number) => Promise<AutomationSession>) | undefined;
}

// ── Connect ──────────────────────────────────────────────────

/**
 * Launch the browser process, then attach an automation session to it,
 * retrying until the debugging endpoint answers or the deadline passes.
 * On session failure the process is stopped before the error surfaces.
 */
export async function connectBrowser(options: ConnectOptions): Promise<BrowserConnection> {
  const driver = await launchDriver(options);
  const attach = options.attach ?? attachSession;
  const deadline = Date.now() + (options.connectDeadlineMs ?? TIMEOUTS.CONNECT_DEADLINE);

  let attempt = 0;
  let lastError = 'no attempt made';

  while (Date.now() < deadline) {
    attempt++;
    try {
      const raw = await attach(driver.endpoint, Math.max(deadline - Date.now(), 1));
      log.stage('session', `Attached to ${driver.endpoint} (attempt ${String(attempt)})`);
      return wrapConnection(new SerialSession(raw), driver);
    } catch (err) {
      lastError = err instanceof Error ? err.message : String(err);
      log.detail(`Waiting for browser endpoint... (${String(attempt)})`);
      await sleep(PACING.CONNECT_RETRY);
    }
  }

  await driver.stop();
  throw new ConnectError(
    'session',
    `Could not attach to ${driver.endpoint}: ${lastError}`,
  );
}

function wrapConnection(session: SerialSession, driver: DriverProcess): BrowserConnection {
  return {
    session,
    async close(): Promise<void> {
      try {
        await session.close();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.warn(`Failed to close browser session: ${message}`);
      }
      await driver.stop();
    },
  };
}
