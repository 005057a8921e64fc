import { describe, expect, test } from 'vitest';

import { FakeSession } from '../../__tests__/helpers/fakeSession.js';
import { SerialSession } from '../serialSession.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('SerialSession', () => {
  test('runs callbacks one at a time in submission order', async () => {
    const session = new SerialSession(new FakeSession());
    const log: string[] = [];
    const gate = deferred();

    const first = session.exclusive(async () => {
      log.push('first:start');
      await gate.promise;
      log.push('first:end');
    });
    const second = session.exclusive(() => {
      log.push('second');
      return Promise.resolve();
    });

    await Promise.resolve();
    expect(log).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(log).toEqual(['first:start', 'first:end', 'second']);
  });

  test('a failing callback does not block later ones', async () => {
    const session = new SerialSession(new FakeSession());

    const failing = session.exclusive(() => Promise.reject(new Error('boom')));
    const next = session.exclusive(() => Promise.resolve('after'));

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('after');
  });

  test('hands the session to the callback', async () => {
    const fake = new FakeSession({ 'https://shop.test/': '<p>hi</p>' });
    const session = new SerialSession(fake);

    const html = await session.exclusive(async (s) => {
      await s.navigate('https://shop.test/');
      return s.content();
    });

    expect(html).toBe('<p>hi</p>');
  });

  test('refuses work once closed', async () => {
    const fake = new FakeSession();
    const session = new SerialSession(fake);

    await session.close();

    expect(session.isClosed).toBe(true);
    expect(fake.closed).toBe(true);
    await expect(session.exclusive(() => Promise.resolve(1))).rejects.toThrow(
      'Browser session is closed',
    );
  });
});
