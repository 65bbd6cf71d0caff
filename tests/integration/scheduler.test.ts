import { SyncScheduler } from '../../src/lib/scheduler';
import { emptySyncState, SyncState } from '../../src/lib/types';

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

// Lets a finished run settle before the next fake interval fires
async function settle(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await Promise.resolve();
  }
}

describe('SyncScheduler', () => {
  let run: jest.Mock<Promise<SyncState>, [string?]>;
  let cancel: jest.Mock<boolean, []>;
  const NOW = new Date('2025-01-01T12:00:00Z');

  const createScheduler = (options: { intervalMs?: number; runOnStartup?: boolean } = {}) =>
    new SyncScheduler({ runFullReconciliation: run, cancel }, { intervalMs: 60_000, now: () => NOW, ...options });

  beforeEach(() => {
    run = jest.fn<Promise<SyncState>, [string?]>(async () => ({ ...emptySyncState(), created: 2 }));
    cancel = jest.fn<boolean, []>(() => true);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('tick', () => {
    it('should run one full reconciliation', async () => {
      await expect(createScheduler().tick()).resolves.toMatchObject({ created: 2 });
      expect(run).toHaveBeenCalledTimes(1);
    });

    it('should skip a tick while the previous run is still going', async () => {
      const pending = deferred<SyncState>();
      run.mockReturnValueOnce(pending.promise);
      const scheduler = createScheduler();

      const first = scheduler.tick();
      await expect(scheduler.tick()).resolves.toBeNull();
      expect(scheduler.getStatus()).toMatchObject({ inFlight: true, skippedTicks: 1 });

      pending.resolve(emptySyncState());
      await expect(first).resolves.toEqual(emptySyncState());
      expect(run).toHaveBeenCalledTimes(1);
      expect(scheduler.getStatus().inFlight).toBe(false);
    });

    it('should survive a failed run and try again on the next tick', async () => {
      run.mockRejectedValueOnce(new Error('Could not list projects'));
      const scheduler = createScheduler();

      await expect(scheduler.tick()).resolves.toBeNull();
      await expect(scheduler.tick()).resolves.toMatchObject({ created: 2 });
    });
  });

  describe('start', () => {
    it('should run immediately when configured to', async () => {
      const scheduler = createScheduler();

      await scheduler.start();
      await scheduler.stop();

      expect(run).toHaveBeenCalledTimes(1);
      expect(scheduler.isRunning()).toBe(false);
    });

    it('should run on every interval', async () => {
      jest.useFakeTimers();
      const scheduler = createScheduler({ intervalMs: 1000, runOnStartup: false });

      await scheduler.start();
      expect(run).not.toHaveBeenCalled();
      expect(scheduler.getStatus()).toMatchObject({ running: true, nextTickAt: null });

      jest.advanceTimersByTime(1000);
      expect(run).toHaveBeenCalledTimes(1);
      await settle();
      jest.advanceTimersByTime(1000);
      expect(run).toHaveBeenCalledTimes(2);

      await scheduler.stop();
    });

    it('should report when the next tick is due', async () => {
      const scheduler = createScheduler();

      await scheduler.start();

      expect(scheduler.getStatus()).toEqual({
        running: true,
        intervalMs: 60_000,
        lastTickAt: '2025-01-01T12:00:00.000Z',
        nextTickAt: '2025-01-01T12:01:00.000Z',
        skippedTicks: 0,
        inFlight: false,
      });
      await scheduler.stop();
    });
  });

  describe('stop', () => {
    it('should cancel the run in flight and wait for it', async () => {
      const pending = deferred<SyncState>();
      run.mockReturnValueOnce(pending.promise);
      cancel.mockImplementation(() => {
        pending.resolve({ ...emptySyncState(), skipped: 3, aborted: true });
        return true;
      });
      const scheduler = createScheduler({ runOnStartup: false });
      await scheduler.start();

      const tick = scheduler.tick();
      await scheduler.stop();

      expect(cancel).toHaveBeenCalledTimes(1);
      expect(scheduler.getStatus().inFlight).toBe(false);
      await expect(tick).resolves.toMatchObject({ aborted: true });
    });
  });
});
