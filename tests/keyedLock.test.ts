import { KeyedLock } from '../src/utils/KeyedLock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  test('should run tasks on the same key one at a time', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.run('session', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = lock.run('session', async () => {
      events.push('second:start');
      return 2;
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  test('should not block tasks on other keys', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const blocked = lock.run('a', () => gate.promise);

    await expect(lock.run('b', async () => 'done')).resolves.toBe('done');

    gate.resolve();
    await blocked;
  });

  test('should continue after a failed task', async () => {
    const lock = new KeyedLock();
    const failing = lock.run('session', async () => {
      throw new Error('boom');
    });
    const next = lock.run('session', async () => 'recovered');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('recovered');
  });

  test('should forget keys once idle', async () => {
    const lock = new KeyedLock();
    await lock.run('session', async () => undefined);
    expect(lock.size).toBe(0);
  });
});
