/**
 * Scheduler Worker
 *
 * Background loop that drains due posts. One tick at a time: the next tick
 * is scheduled only after the current one finishes, so a slow tick delays
 * the loop instead of overlapping it. Rows are processed sequentially, each
 * under its platform lock, and a row's failure never aborts the tick.
 */

import type { Clock, Logger } from '../../core/types.js';
import { toLocalTimestamp } from '../../core/clock.js';
import type { ScheduledPostStore } from '../../core/storage/scheduled-post-store.js';
import type { PlatformLocks } from '../../core/scheduling/platform-locks.js';
import type { CredentialCache, Dispatcher } from './dispatcher.js';

export const DEFAULT_WORKER_INTERVAL_MS = 60_000;

export interface TickSummary {
  due: number;
  posted: number;
  failed: number;
  skipped: number;
}

export interface SchedulerWorkerDeps {
  posts: ScheduledPostStore;
  dispatcher: Dispatcher;
  locks: PlatformLocks;
  clock: Clock;
  logger: Logger;
  intervalMs?: number;
}

export class SchedulerWorker {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private inFlight: Promise<void> | null = null;
  private intervalMs: number;

  constructor(private deps: SchedulerWorkerDeps) {
    this.intervalMs = deps.intervalMs ?? DEFAULT_WORKER_INTERVAL_MS;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Runs one tick immediately, then keeps ticking every interval. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.deps.logger.info('Scheduler worker started', { intervalMs: this.intervalMs });
    this.runLoop();
  }

  /** Stops scheduling new ticks and waits for the current one. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
    this.deps.logger.info('Scheduler worker stopped');
  }

  async tick(): Promise<TickSummary> {
    const { posts, dispatcher, locks, clock, logger } = this.deps;
    const due = posts.listDue(clock.now());
    const summary: TickSummary = { due: due.length, posted: 0, failed: 0, skipped: 0 };
    if (due.length === 0) return summary;

    const credentials: CredentialCache = new Map();

    for (const row of due) {
      try {
        await locks.runExclusive([row.platform], async () => {
          // A cancel, edit or post-now may have got here first
          const current = posts.get(row.id);
          if (!current || current.status !== 'pending' || current.scheduledFor > toLocalTimestamp(clock.now())) {
            summary.skipped++;
            return;
          }

          const result = await dispatcher.dispatch(current, credentials);
          if (result.ok) summary.posted++;
          else if (result.code === 'not_pending') summary.skipped++;
          else summary.failed++;
        });
      } catch (err) {
        summary.failed++;
        logger.error('Scheduler worker failed on post', {
          postId: row.id,
          platform: row.platform,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    logger.info('Scheduler tick complete', { ...summary });
    return summary;
  }

  private runLoop(): void {
    this.inFlight = this.safeTick().finally(() => {
      this.inFlight = null;
      if (!this.running) return;
      this.timer = setTimeout(() => this.runLoop(), this.intervalMs);
      if (typeof this.timer.unref === 'function') {
        this.timer.unref();
      }
    });
  }

  private async safeTick(): Promise<void> {
    try {
      await this.tick();
    } catch (err) {
      this.deps.logger.error('Scheduler tick failed', { error: err instanceof Error ? err.message : String(err) });
    }
  }
}
