/**
 * Scheduler wiring: stores, algorithms, publishing and the background
 * worker over one shared SQLite handle.
 */

import type { Clock, Logger } from '../../core/types.js';
import { systemClock } from '../../core/clock.js';
import type { SqliteDatabase } from '../../core/storage/database.js';
import { TimeSlotStore } from '../../core/storage/time-slot-store.js';
import { DailyLimitStore } from '../../core/storage/daily-limit-store.js';
import { ScheduledPostStore } from '../../core/storage/scheduled-post-store.js';
import { ContentStore } from '../../core/storage/content-store.js';
import { TokenStore } from '../../core/storage/token-store.js';
import { SlotAllocator } from '../../core/scheduling/slot-allocator.js';
import { QueueMaterializer } from '../../core/scheduling/queue-materializer.js';
import { PlatformLocks } from '../../core/scheduling/platform-locks.js';
import { CredentialManager, type CredentialProvider } from '../social/credentials.js';
import { createPublishers } from '../social/index.js';
import type { LinkedInAppConfig } from '../social/linkedin.js';
import type { PublisherRegistry } from '../social/types.js';
import { Dispatcher } from './dispatcher.js';
import { SchedulerService } from './service.js';
import { SchedulerWorker } from './worker.js';

export interface SchedulerOptions {
  db: SqliteDatabase;
  logger: Logger;
  tokenSecret: string;
  clock?: Clock;
  linkedin?: LinkedInAppConfig;
  workerIntervalMs?: number;
  /** Replaces the HTTP publishers (tests, dry runs). */
  publishers?: PublisherRegistry;
  /** Replaces the token-backed credential manager. */
  credentials?: CredentialProvider;
}

export interface Scheduler {
  slots: TimeSlotStore;
  limits: DailyLimitStore;
  posts: ScheduledPostStore;
  content: ContentStore;
  tokens: TokenStore;
  allocator: SlotAllocator;
  materializer: QueueMaterializer;
  locks: PlatformLocks;
  credentials: CredentialProvider;
  publishers: PublisherRegistry;
  dispatcher: Dispatcher;
  service: SchedulerService;
  worker: SchedulerWorker;
}

export function createScheduler(options: SchedulerOptions): Scheduler {
  const { db, logger } = options;
  const clock = options.clock ?? systemClock;
  const now = () => clock.now();

  const slots = new TimeSlotStore(db, now);
  const limits = new DailyLimitStore(db);
  const posts = new ScheduledPostStore(db, now);
  const content = new ContentStore(db, now);
  const tokens = new TokenStore(db, options.tokenSecret, now);

  const allocator = new SlotAllocator(slots, limits, posts, clock);
  const materializer = new QueueMaterializer(posts, allocator, logger);
  const locks = new PlatformLocks();

  const publishers = options.publishers ?? createPublishers({ linkedin: options.linkedin ?? {}, logger });
  const credentials = options.credentials ?? new CredentialManager(tokens, publishers, clock, logger);

  const dispatcher = new Dispatcher({ posts, content, usage: content, credentials, publishers, logger });
  const service = new SchedulerService({
    slots, limits, posts, content, allocator, materializer, dispatcher, locks, clock, logger,
  });
  const worker = new SchedulerWorker({
    posts, dispatcher, locks, clock, logger, intervalMs: options.workerIntervalMs,
  });

  return {
    slots, limits, posts, content, tokens, allocator, materializer, locks,
    credentials, publishers, dispatcher, service, worker,
  };
}

export { SchedulerService, SchedulerWorker, Dispatcher };
export type { TickSummary } from './worker.js';
