import { spawn } from 'node:child_process';
import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { PACING, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { sleep } from '../utils/timing.js';
import { ConnectError } from './errors.js';

// ── Public types ─────────────────────────────────────────────

/** The part of a child process the supervisor needs. */
export interface DriverChild {
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'exit', listener: (code: number | null) => void): unknown;
  once(event: 'error', listener: (err: Error) => void): unknown;
}

export type SpawnDriver = (command: string, args: readonly string[]) => DriverChild;

export interface DriverOptions {
  binary: string;
  debugPort: number;
  headless: boolean;
  /** Reused profile directory; a temporary one is created when absent. */
  profileDir?: string | undefined;
  startupDelayMs?: number | undefined;
  stopGraceMs?: number | undefined;
  spawn?: SpawnDriver | undefined;
}

export interface DriverProcess {
  readonly endpoint: string;
  readonly pid: number | undefined;
  stop(): Promise<void>;
}

const defaultSpawn: SpawnDriver = (command, args) =>
  spawn(command, args, { stdio: 'ignore' });

// ── Launch ───────────────────────────────────────────────────

export function driverArgs(
  debugPort: number,
  profileDir: string,
  headless: boolean,
): string[] {
  const args = [
    `--remote-debugging-port=${String(debugPort)}`,
    `--user-data-dir=${profileDir}`,
    '--no-first-run',
    '--no-default-browser-check',
  ];
  if (headless) args.push('--headless=new');
  return args;
}

/**
 * Launch the browser with remote debugging enabled and supervise it.
 * The returned handle owns the process: `stop()` terminates it and, once
 * the Node process exits, a still-running child is killed.
 */
export async function launchDriver(options: DriverOptions): Promise<DriverProcess> {
  const ownsProfile = options.profileDir === undefined;
  const profileDir =
    options.profileDir ?? (await mkdtemp(path.join(os.tmpdir(), 'shelfscan-profile-')));

  const spawnDriver = options.spawn ?? defaultSpawn;
  const args = driverArgs(options.debugPort, profileDir, options.headless);

  log.stage('driver', `Launching ${options.binary} on port ${String(options.debugPort)}`);

  let child: DriverChild;
  try {
    child = spawnDriver(options.binary, args);
  } catch (err) {
    await cleanupProfile(ownsProfile, profileDir);
    const message = err instanceof Error ? err.message : String(err);
    throw new ConnectError('driver', `Failed to spawn ${options.binary}: ${message}`);
  }

  const status: { exited: boolean; error: Error | undefined } = {
    exited: child.exitCode !== null,
    error: undefined,
  };
  child.once('exit', () => {
    status.exited = true;
  });
  child.once('error', (err) => {
    status.error = err;
    status.exited = true;
  });

  const killOnExit = (): void => {
    if (!status.exited) child.kill('SIGKILL');
  };
  process.once('exit', killOnExit);

  await sleep(options.startupDelayMs ?? PACING.DRIVER_STARTUP);

  if (status.exited) {
    process.removeListener('exit', killOnExit);
    await cleanupProfile(ownsProfile, profileDir);
    const reason = status.error
      ? status.error.message
      : `exited with code ${String(child.exitCode)}`;
    throw new ConnectError('driver', `Browser process ${options.binary} ${reason}`);
  }

  let stopped = false;

  return {
    endpoint: `http://127.0.0.1:${String(options.debugPort)}`,
    pid: child.pid,

    async stop(): Promise<void> {
      if (stopped) return;
      stopped = true;
      process.removeListener('exit', killOnExit);

      if (!status.exited) {
        const exitedInTime = waitForExit(child, options.stopGraceMs ?? TIMEOUTS.DRIVER_STOP_GRACE);
        child.kill('SIGTERM');
        if (!(await exitedInTime)) {
          log.warn('Browser process ignored SIGTERM, sending SIGKILL');
          child.kill('SIGKILL');
        }
      }

      await cleanupProfile(ownsProfile, profileDir);
      log.stage('driver', 'Browser process stopped');
    },
  };
}

// ── Helpers ──────────────────────────────────────────────────

function waitForExit(child: DriverChild, timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), timeoutMs);
    child.once('exit', () => {
      clearTimeout(timer);
      resolve(true);
    });
  });
}

async function cleanupProfile(owned: boolean, dir: string): Promise<void> {
  if (!owned) return;
  try {
    await rm(dir, { recursive: true, force: true });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.warn(`Could not remove temporary profile ${dir}: ${message}`);
  }
}
