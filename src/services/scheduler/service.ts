/**
 * Scheduler Service
 *
 * The API-facing facade over the scheduling queue. Every mutation runs inside
 * the per-platform lock of each platform it touches; SQLite transactions in
 * the stores and materializer make each step atomic.
 */

import {
  PLATFORMS,
  fail,
  succeed,
  type ContentRef,
  type ContentResolver,
  type Clock,
  type Logger,
  type Platform,
  type PlatformDailyLimit,
  type QueuePosition,
  type ScheduledPost,
  type ScheduledPostStatus,
  type SchedulingFailure,
  type SchedulingResult,
  type TimeSlot,
} from '../../core/types.js';
import { isFutureEnough, parseTimestamp, toLocalTimestamp } from '../../core/clock.js';
import { TimeSlotValidationError } from '../../core/errors.js';
import type { TimeSlotStore } from '../../core/storage/time-slot-store.js';
import type { DailyLimitStore } from '../../core/storage/daily-limit-store.js';
import { contentIdOf, type ScheduledPostStore } from '../../core/storage/scheduled-post-store.js';
import type { SlotAllocator } from '../../core/scheduling/slot-allocator.js';
import type { QueueMaterializer } from '../../core/scheduling/queue-materializer.js';
import type { PlatformLocks } from '../../core/scheduling/platform-locks.js';
import type { Dispatcher } from './dispatcher.js';

export const RETRY_ERROR_PREFIX = 'Retry failed: ';

export type Redistribution = Record<Platform, number>;

export interface SlotChange {
  slot: TimeSlot;
  redistributed: Redistribution;
}

export interface LimitChange extends PlatformDailyLimit {
  redistributed: number;
}

export interface SchedulerServiceDeps {
  slots: TimeSlotStore;
  limits: DailyLimitStore;
  posts: ScheduledPostStore;
  content: ContentResolver;
  allocator: SlotAllocator;
  materializer: QueueMaterializer;
  dispatcher: Dispatcher;
  locks: PlatformLocks;
  clock: Clock;
  logger: Logger;
}

export class SchedulerService {
  constructor(private deps: SchedulerServiceDeps) {}

  // ─── Queue ──────────────────────────────────────────────

  /** Queues content on the platform's next free slot. */
  enqueue(content: ContentRef, platform: Platform): Promise<SchedulingResult<ScheduledPost>> {
    return this.exclusive<SchedulingResult<ScheduledPost>>([platform], () => {
      const missing = this.checkContent(content);
      if (missing) return missing;

      const slot = this.deps.allocator.nextAvailableSlot(platform);
      if (!slot.ok) return slot;

      const post = this.deps.posts.create({ content, platform, scheduledFor: slot.value });
      this.deps.logger.info('Post queued', { postId: post.id, platform, scheduledFor: post.scheduledFor });
      return succeed(post);
    });
  }

  /** Queues content at an explicit time. Daily caps apply to slot search only. */
  scheduleAt(content: ContentRef, platform: Platform, at: string): Promise<SchedulingResult<ScheduledPost>> {
    return this.exclusive<SchedulingResult<ScheduledPost>>([platform], () => {
      const time = this.validateTime(at);
      if (!time.ok) return time;

      const missing = this.checkContent(content);
      if (missing) return missing;

      if (this.deps.posts.isTimeTaken(platform, time.value)) {
        return fail('slot_taken', `Another ${platform} post is already scheduled for ${time.value}`);
      }

      const post = this.deps.posts.create({ content, platform, scheduledFor: time.value });
      this.deps.logger.info('Post scheduled', { postId: post.id, platform, scheduledFor: post.scheduledFor });
      return succeed(post);
    });
  }

  cancel(id: string): Promise<SchedulingResult<ScheduledPost>> {
    return this.withPost(id, (post) => {
      if (post.status !== 'pending' || !this.deps.posts.cancel(id)) {
        return fail('not_pending', 'Could not cancel post (may already be posted, cancelled or publishing)');
      }
      return this.reload(id);
    });
  }

  /** Cancels the pending row queued for a piece of content on one platform. */
  cancelBySource(content: ContentRef, platform: Platform): Promise<boolean> {
    return this.exclusive([platform], () => this.deps.posts.cancelBySource(content, platform));
  }

  delete(id: string): Promise<boolean> {
    return this.exclusive(PLATFORMS, () => this.deps.posts.delete(id));
  }

  deleteBulk(ids: readonly string[]): Promise<number> {
    return this.exclusive(PLATFORMS, () => this.deps.posts.deleteBulk(ids));
  }

  clearAllPending(): Promise<number> {
    return this.exclusive(PLATFORMS, () => {
      const removed = this.deps.posts.clearAllPending();
      this.deps.logger.info('Cleared pending queue', { removed });
      return removed;
    });
  }

  /** Moves a pending row to an explicit time on its own platform. */
  editTime(id: string, at: string): Promise<SchedulingResult<ScheduledPost>> {
    return this.withPost(id, (post) => {
      if (post.status !== 'pending') {
        return fail('not_pending', 'Could not update post (may not be pending or is publishing)');
      }
      const time = this.validateTime(at);
      if (!time.ok) return time;

      if (this.deps.posts.isTimeTaken(post.platform, time.value, id)) {
        return fail('slot_taken', `Another ${post.platform} post is already scheduled for ${time.value}`);
      }
      if (!this.deps.posts.updateScheduledFor(id, time.value)) {
        return fail('not_pending', 'Could not update post (may not be pending or is publishing)');
      }
      return this.reload(id);
    });
  }

  reorder(ids: readonly string[]): Promise<boolean> {
    return this.exclusive(PLATFORMS, () => this.deps.materializer.reorder(ids));
  }

  moveToPosition(ids: readonly string[], position: QueuePosition, platform?: Platform): Promise<boolean> {
    return this.exclusive(platform ? [platform] : PLATFORMS, () =>
      this.deps.materializer.moveToPosition(ids, position, platform ? { platform } : {}));
  }

  redistribute(platform: Platform): Promise<number> {
    return this.exclusive([platform], () => this.deps.materializer.redistribute(platform));
  }

  redistributeAll(): Promise<Redistribution> {
    return this.exclusive(PLATFORMS, () => this.redistributeUnlocked());
  }

  /**
   * Publishes a pending row immediately. Failures leave it queued. Posting
   * ahead of schedule re-packs the platform so later rows move up.
   */
  postNow(id: string): Promise<SchedulingResult<ScheduledPost>> {
    return this.withPost(id, async (post) => {
      if (post.status !== 'pending') {
        return fail('not_pending', 'Only pending posts can be posted immediately');
      }

      const prepared = await this.deps.dispatcher.prepare(post);
      if (!prepared.ok) return prepared;

      const result = await this.deps.dispatcher.publishPrepared(post, prepared.value, { keepPendingOnFailure: true });
      if (result.ok && toLocalTimestamp(this.deps.clock.now()) < post.scheduledFor) {
        this.deps.materializer.redistribute(post.platform);
      }
      return result;
    });
  }

  /**
   * Re-publishes a failed row. Content and credential are checked first; the
   * row goes back through pending and ends posted or failed again.
   */
  retry(id: string): Promise<SchedulingResult<ScheduledPost>> {
    return this.withPost(id, async (post) => {
      if (post.status !== 'failed') {
        return fail('not_pending', 'Only failed posts can be retried');
      }

      const prepared = await this.deps.dispatcher.prepare(post);
      if (!prepared.ok) return prepared;

      const pending = this.deps.posts.updateStatus(id, 'pending');
      if (!pending) return fail('not_found', `Scheduled post ${id} not found`);
      return this.deps.dispatcher.publishPrepared(pending, prepared.value, { errorPrefix: RETRY_ERROR_PREFIX });
    });
  }

  list(filters?: { status?: ScheduledPostStatus; platform?: Platform; limit?: number }): ScheduledPost[] {
    return this.deps.posts.list(filters);
  }

  get(id: string): ScheduledPost | undefined {
    return this.deps.posts.get(id);
  }

  summary(): Record<ScheduledPostStatus, number> {
    return this.deps.posts.summary();
  }

  nextSlotPreview(platform: Platform): SchedulingResult<string> {
    return this.deps.allocator.nextAvailableSlot(platform);
  }

  // ─── Time slots ─────────────────────────────────────────

  listSlots(): TimeSlot[] {
    return this.deps.slots.list();
  }

  addSlot(input: { dayOfWeek: number; timeOfDay: string; enabled?: boolean }): Promise<SchedulingResult<SlotChange>> {
    return this.changeSlots(() => this.deps.slots.add(input));
  }

  updateSlot(
    id: string,
    fields: { dayOfWeek?: number; timeOfDay?: string; enabled?: boolean },
  ): Promise<SchedulingResult<SlotChange>> {
    return this.changeSlots(() => this.deps.slots.update(id, fields));
  }

  toggleSlot(id: string): Promise<SchedulingResult<SlotChange>> {
    return this.changeSlots(() => this.deps.slots.toggle(id));
  }

  deleteSlot(id: string): Promise<SchedulingResult<Redistribution>> {
    return this.exclusive<SchedulingResult<Redistribution>>(PLATFORMS, () => {
      if (!this.deps.slots.delete(id)) return fail('not_found', `Time slot ${id} not found`);
      return succeed(this.redistributeUnlocked());
    });
  }

  // ─── Daily limits ───────────────────────────────────────

  getLimits(): Record<Platform, number> {
    return this.deps.limits.listAll();
  }

  setLimit(platform: Platform, maxPerDay: number): Promise<SchedulingResult<LimitChange>> {
    return this.exclusive<SchedulingResult<LimitChange>>([platform], () => {
      if (!Number.isInteger(maxPerDay) || maxPerDay < 0) {
        return fail('invalid_request', 'Daily limit must be a non-negative integer');
      }
      this.deps.limits.setLimit(platform, maxPerDay);
      const redistributed = this.deps.materializer.redistribute(platform);
      return succeed({ platform, maxPerDay, redistributed });
    });
  }

  // ─── Internals ──────────────────────────────────────────

  private exclusive<T>(platforms: readonly Platform[], task: () => T | Promise<T>): Promise<T> {
    return this.deps.locks.runExclusive(platforms, task);
  }

  /** Locks the row's platform, then re-reads the row under the lock. */
  private async withPost<T>(
    id: string,
    task: (post: ScheduledPost) => SchedulingResult<T> | Promise<SchedulingResult<T>>,
  ): Promise<SchedulingResult<T>> {
    const first = this.deps.posts.get(id);
    if (!first) return fail('not_found', `Scheduled post ${id} not found`);

    return this.exclusive<SchedulingResult<T>>([first.platform], () => {
      const post = this.deps.posts.get(id);
      if (!post) return fail('not_found', `Scheduled post ${id} not found`);
      return task(post);
    });
  }

  private reload(id: string): SchedulingResult<ScheduledPost> {
    const post = this.deps.posts.get(id);
    return post ? succeed(post) : fail('not_found', `Scheduled post ${id} not found`);
  }

  private validateTime(raw: string): SchedulingResult<string> {
    const parsed = parseTimestamp(raw);
    if (!parsed) return fail('invalid_request', 'Invalid datetime format');
    if (!isFutureEnough(parsed, this.deps.clock.now())) {
      return fail('not_in_future', 'Scheduled time must be in the future');
    }
    return succeed(toLocalTimestamp(parsed));
  }

  private checkContent(content: ContentRef): SchedulingFailure | null {
    if (this.deps.content.resolveContent(content)) return null;
    return fail('not_found', `Content ${content.kind}:${contentIdOf(content)} not found`);
  }

  private changeSlots(mutate: () => TimeSlot | undefined): Promise<SchedulingResult<SlotChange>> {
    return this.exclusive<SchedulingResult<SlotChange>>(PLATFORMS, () => {
      let slot: TimeSlot | undefined;
      try {
        slot = mutate();
      } catch (err) {
        if (err instanceof TimeSlotValidationError) return fail('invalid_request', err.message);
        throw err;
      }
      if (!slot) return fail('not_found', 'Time slot not found');
      return succeed({ slot, redistributed: this.redistributeUnlocked() });
    });
  }

  private redistributeUnlocked(): Redistribution {
    const counts: Redistribution = { linkedin: 0, threads: 0 };
    for (const platform of PLATFORMS) {
      counts[platform] = this.deps.materializer.redistribute(platform);
    }
    this.deps.logger.info('Queues redistributed', { ...counts });
    return counts;
  }
}
