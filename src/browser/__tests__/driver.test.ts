import { EventEmitter } from 'node:events';
import { access } from 'node:fs/promises';

import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { setLogSink } from '../../utils/logger.js';
import { driverArgs, launchDriver } from '../driver.js';
import type { DriverChild } from '../driver.js';
import { ConnectError } from '../errors.js';

class FakeChild extends EventEmitter implements DriverChild {
  readonly pid = 4242;
  exitCode: number | null;
  readonly signals: NodeJS.Signals[] = [];

  constructor(
    private readonly exitsOn: readonly NodeJS.Signals[],
    exitCode: number | null = null,
  ) {
    super();
    this.exitCode = exitCode;
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signals.push(signal);
    if (this.exitsOn.includes(signal)) {
      this.exitCode = 0;
      this.emit('exit', 0);
    }
    return true;
  }
}

beforeEach(() => {
  setLogSink(() => undefined);
});

afterEach(() => {
  setLogSink();
});

describe('driverArgs', () => {
  test('enables remote debugging on the given profile', () => {
    expect(driverArgs(9222, '/tmp/profile', true)).toEqual([
      '--remote-debugging-port=9222',
      '--user-data-dir=/tmp/profile',
      '--no-first-run',
      '--no-default-browser-check',
      '--headless=new',
    ]);
  });
});

describe('launchDriver', () => {
  test('launches the binary and stops it with SIGTERM', async () => {
    const child = new FakeChild(['SIGTERM']);
    const spawned: [string, readonly string[]][] = [];

    const driver = await launchDriver({
      binary: 'chrome',
      debugPort: 9333,
      headless: false,
      profileDir: '/tmp/shelfscan-test-profile',
      startupDelayMs: 0,
      stopGraceMs: 50,
      spawn: (command, args) => {
        spawned.push([command, args]);
        return child;
      },
    });

    expect(driver.endpoint).toBe('http://127.0.0.1:9333');
    expect(driver.pid).toBe(4242);
    expect(spawned).toEqual([
      ['chrome', driverArgs(9333, '/tmp/shelfscan-test-profile', false)],
    ]);

    await driver.stop();
    await driver.stop();
    expect(child.signals).toEqual(['SIGTERM']);
  });

  test('escalates to SIGKILL when SIGTERM is ignored', async () => {
    const child = new FakeChild(['SIGKILL']);
    const driver = await launchDriver({
      binary: 'chrome',
      debugPort: 9333,
      headless: true,
      profileDir: '/tmp/shelfscan-test-profile',
      startupDelayMs: 0,
      stopGraceMs: 10,
      spawn: () => child,
    });

    await driver.stop();

    expect(child.signals).toEqual(['SIGTERM', 'SIGKILL']);
  });

  test('removes a temporary profile on stop', async () => {
    let profile = '';
    const driver = await launchDriver({
      binary: 'chrome',
      debugPort: 9333,
      headless: true,
      startupDelayMs: 0,
      stopGraceMs: 10,
      spawn: (_command, args) => {
        profile = args.find((a) => a.startsWith('--user-data-dir='))?.slice('--user-data-dir='.length) ?? '';
        return new FakeChild(['SIGTERM']);
      },
    });

    await expect(access(profile)).resolves.toBeUndefined();
    await driver.stop();
    await expect(access(profile)).rejects.toThrow();
  });

  test('reports a process that exits during startup', async () => {
    const launch = launchDriver({
      binary: 'chrome',
      debugPort: 9333,
      headless: true,
      profileDir: '/tmp/shelfscan-test-profile',
      startupDelayMs: 0,
      spawn: () => new FakeChild([], 1),
    });

    await expect(launch).rejects.toThrow(ConnectError);
    await expect(launch).rejects.toThrow('Browser process chrome exited with code 1');
  });

  test('reports a binary that cannot be spawned', async () => {
    const launch = launchDriver({
      binary: 'missing-browser',
      debugPort: 9333,
      headless: true,
      profileDir: '/tmp/shelfscan-test-profile',
      startupDelayMs: 0,
      spawn: () => {
        throw new Error('spawn missing-browser ENOENT');
      },
    });

    await expect(launch).rejects.toMatchObject({
      name: 'ConnectError',
      stage: 'driver',
      message: 'Failed to spawn missing-browser: spawn missing-browser ENOENT',
    });
  });
});
