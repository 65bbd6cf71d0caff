/**
 * Periodic full reconciliation with at most one run in flight
 */

import { errorMessage } from './errors';
import { Logger, silentLogger } from './logger';
import { formatCounts, SyncEngine } from './sync-engine';
import { SyncState } from './types';

export type FullReconciler = Pick<SyncEngine, 'runFullReconciliation' | 'cancel'>;

export interface SchedulerOptions {
  intervalMs?: number;
  runOnStartup?: boolean;
  logger?: Logger;
  now?: () => Date;
}

export interface SchedulerStatus {
  running: boolean;
  intervalMs: number;
  lastTickAt: string | null;
  nextTickAt: string | null;
  skippedTicks: number;
  inFlight: boolean;
}

export class SyncScheduler {
  private engine: FullReconciler;
  private intervalMs: number;
  private runOnStartup: boolean;
  private logger: Logger;
  private now: () => Date;

  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<SyncState | null> | null = null;
  private lastTickAt: Date | null = null;
  private skippedTicks = 0;

  constructor(engine: FullReconciler, options: SchedulerOptions = {}) {
    this.engine = engine;
    this.intervalMs = options.intervalMs ?? 300_000;
    this.runOnStartup = options.runOnStartup ?? true;
    this.logger = (options.logger ?? silentLogger).child('Scheduler');
    this.now = options.now ?? (() => new Date());
  }

  async start(): Promise<void> {
    if (this.timer) return;

    this.logger.info(`Starting, full reconciliation every ${this.intervalMs / 1000}s`);
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);

    if (this.runOnStartup) {
      await this.tick();
    }
  }

  /**
   * Run one full reconciliation unless one is still going; null when skipped or failed
   */
  async tick(): Promise<SyncState | null> {
    if (this.inFlight) {
      this.skippedTicks++;
      this.logger.warn('Previous reconciliation still running, skipping this tick');
      return null;
    }

    this.lastTickAt = this.now();
    const run = this.runOnce();
    this.inFlight = run;
    try {
      return await run;
    } finally {
      this.inFlight = null;
    }
  }

  /**
   * Stop ticking, cancel the current run and wait for it to settle
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    if (this.inFlight) {
      this.engine.cancel();
      await this.inFlight;
    }
    this.logger.info('Stopped');
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getStatus(): SchedulerStatus {
    const nextTickAt =
      this.timer && this.lastTickAt ? new Date(this.lastTickAt.getTime() + this.intervalMs).toISOString() : null;

    return {
      running: this.isRunning(),
      intervalMs: this.intervalMs,
      lastTickAt: this.lastTickAt ? this.lastTickAt.toISOString() : null,
      nextTickAt,
      skippedTicks: this.skippedTicks,
      inFlight: this.inFlight !== null,
    };
  }

  private async runOnce(): Promise<SyncState | null> {
    try {
      const state = await this.engine.runFullReconciliation();
      this.logger.info(`Tick done: ${formatCounts(state)}, ${state.errors.length} error(s)`);
      return state;
    } catch (error) {
      // The next tick is the retry
      this.logger.error(`Full reconciliation failed: ${errorMessage(error)}`);
      return null;
    }
  }
}
