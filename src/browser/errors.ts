// ── Error ─────────────────────────────────────────────────────

export type ConnectStage = 'driver' | 'session';

/**
 * The browser process could not be started, or the automation session
 * could not attach to it. Fatal to the run.
 */
export class ConnectError extends Error {
  readonly exitCode = 1;
  readonly stage: ConnectStage;

  constructor(stage: ConnectStage, message: string) {
    super(message);
    this.name = 'ConnectError';
    this.stage = stage;
  }
}
