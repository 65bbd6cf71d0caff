import { KeyedLock } from '../../src/lib/keyed-lock';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  let lock: KeyedLock;

  beforeEach(() => {
    lock = new KeyedLock();
  });

  it('should run work on the same key one at a time', async () => {
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run('cal-a', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.run('cal-a', async () => {
      order.push('second');
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should let different keys run concurrently', async () => {
    const gate = deferred();
    const order: string[] = [];

    const blocked = lock.run('cal-a', async () => {
      await gate.promise;
      order.push('a');
    });
    await lock.run('cal-b', async () => {
      order.push('b');
    });

    expect(order).toEqual(['b']);
    gate.resolve();
    await blocked;
    expect(order).toEqual(['b', 'a']);
  });

  it('should release the key when the work throws', async () => {
    await expect(
      lock.run('cal-a', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(lock.isLocked('cal-a')).toBe(false);
    await expect(lock.run('cal-a', async () => 'next')).resolves.toBe('next');
  });
});
