import { join } from 'path';
import { mkdirSync, rmSync } from 'fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { openDatabase, type SqliteDatabase } from '../src/core/storage/database.js';
import { contentRefOf } from '../src/core/storage/scheduled-post-store.js';
import { fixedClock } from '../src/core/clock.js';
import type { ContentRef, Platform } from '../src/core/types.js';
import { createScheduler, type Scheduler } from '../src/services/scheduler/index.js';
import { RETRY_ERROR_PREFIX } from '../src/services/scheduler/service.js';
import { FakeCredentials, fakePublishers, logger, mondayMorning, type FakePublisher } from './support.js';

const TEST_ROOT = join(import.meta.dirname ?? '.', '__scheduler_service_test_tmp__');

describe('SchedulerService', () => {
  let db: SqliteDatabase;
  let publishers: { linkedin: FakePublisher; threads: FakePublisher };
  let credentials: FakeCredentials;
  let scheduler: Scheduler;

  const newContent = (text: string, platform: Platform = 'linkedin'): ContentRef =>
    contentRefOf('social', scheduler.content.addSocialPost({ content: text, platform }).id);

  const enqueued = async (text: string, platform: Platform = 'linkedin') => {
    const result = await scheduler.service.enqueue(newContent(text, platform), platform);
    if (!result.ok) throw new Error(result.message);
    return result.value;
  };

  beforeEach(() => {
    rmSync(TEST_ROOT, { recursive: true, force: true });
    mkdirSync(TEST_ROOT, { recursive: true });
    db = openDatabase(join(TEST_ROOT, 'scheduler.db'));
    publishers = fakePublishers();
    credentials = new FakeCredentials();
    scheduler = createScheduler({
      db,
      logger,
      tokenSecret: 'test-secret',
      clock: fixedClock(mondayMorning()),
      publishers,
      credentials,
    });
    scheduler.slots.seedDefaults();
  });

  afterEach(() => {
    db.close();
    rmSync(TEST_ROOT, { recursive: true, force: true });
  });

  describe('enqueue', () => {
    it('places consecutive posts on consecutive free slots', async () => {
      const first = await enqueued('first');
      const second = await enqueued('second');
      const threads = await enqueued('third', 'threads');

      expect(first.scheduledFor).toBe('2026-01-05T12:00:00');
      expect(second.scheduledFor).toBe('2026-01-05T17:00:00');
      expect(threads.scheduledFor).toBe('2026-01-05T12:00:00');
    });

    it('rejects content that does not exist', async () => {
      const result = await scheduler.service.enqueue(contentRefOf('article', 'art_missing'), 'linkedin');
      expect(result).toEqual({ ok: false, code: 'not_found', message: 'Content article:art_missing not found' });
    });

    it('reports when no slots are configured', async () => {
      for (const slot of scheduler.slots.list()) scheduler.slots.delete(slot.id);
      const result = await scheduler.service.enqueue(newContent('nowhere'), 'linkedin');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.code).toBe('no_slots_configured');
    });
  });

  describe('scheduleAt', () => {
    it('stores an explicit time and refuses a second post at the same time', async () => {
      const first = await scheduler.service.scheduleAt(newContent('a'), 'linkedin', '2026-01-06T08:30');
      expect(first.ok && first.value.scheduledFor).toBe('2026-01-06T08:30:00');

      const clash = await scheduler.service.scheduleAt(newContent('b'), 'linkedin', '2026-01-06T08:30:00');
      expect(clash.ok).toBe(false);
      if (!clash.ok) expect(clash.code).toBe('slot_taken');

      const otherPlatform = await scheduler.service.scheduleAt(newContent('c', 'threads'), 'threads', '2026-01-06T08:30:00');
      expect(otherPlatform.ok).toBe(true);
    });

    it('accepts times within a minute of now but not earlier ones', async () => {
      const justNow = await scheduler.service.scheduleAt(newContent('a'), 'linkedin', '2026-01-05T09:59:30');
      expect(justNow.ok).toBe(true);

      const past = await scheduler.service.scheduleAt(newContent('b'), 'linkedin', '2026-01-05T09:00:00');
      expect(past).toEqual({ ok: false, code: 'not_in_future', message: 'Scheduled time must be in the future' });

      const garbage = await scheduler.service.scheduleAt(newContent('c'), 'linkedin', 'next tuesday');
      expect(garbage).toEqual({ ok: false, code: 'invalid_request', message: 'Invalid datetime format' });
    });

    it('ignores the daily cap', async () => {
      await scheduler.service.setLimit('linkedin', 1);
      await enqueued('capped');
      const explicit = await scheduler.service.scheduleAt(newContent('extra'), 'linkedin', '2026-01-05T20:00:00');
      expect(explicit.ok).toBe(true);
    });
  });

  describe('editTime and cancel', () => {
    it('moves a pending post to a new time', async () => {
      const post = await enqueued('movable');
      const result = await scheduler.service.editTime(post.id, '2026-01-08T07:15:00');
      expect(result.ok && result.value.scheduledFor).toBe('2026-01-08T07:15:00');
    });

    it('refuses a time held by another post on the platform', async () => {
      const first = await enqueued('first');
      const second = await enqueued('second');
      const result = await scheduler.service.editTime(second.id, first.scheduledFor);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.code).toBe('slot_taken');

      const same = await scheduler.service.editTime(first.id, first.scheduledFor);
      expect(same.ok).toBe(true);
    });

    it('only cancels pending posts', async () => {
      const post = await enqueued('cancel me');
      const cancelled = await scheduler.service.cancel(post.id);
      expect(cancelled.ok && cancelled.value.status).toBe('cancelled');

      const again = await scheduler.service.cancel(post.id);
      expect(again.ok).toBe(false);
      if (!again.ok) expect(again.code).toBe('not_pending');

      const edit = await scheduler.service.editTime(post.id, '2026-01-08T07:15:00');
      expect(edit.ok).toBe(false);
      if (!edit.ok) expect(edit.code).toBe('not_pending');

      const missing = await scheduler.service.cancel('sp_missing');
      expect(missing.ok).toBe(false);
      if (!missing.ok) expect(missing.code).toBe('not_found');
    });

    it('cancels by source content and platform', async () => {
      const content = newContent('by source');
      const result = await scheduler.service.enqueue(content, 'linkedin');
      expect(result.ok).toBe(true);

      await expect(scheduler.service.cancelBySource(content, 'threads')).resolves.toBe(false);
      await expect(scheduler.service.cancelBySource(content, 'linkedin')).resolves.toBe(true);
      await expect(scheduler.service.cancelBySource(content, 'linkedin')).resolves.toBe(false);
    });
  });

  describe('postNow', () => {
    it('publishes immediately and pulls later posts forward', async () => {
      const first = await enqueued('first');
      const second = await enqueued('second');

      const result = await scheduler.service.postNow(first.id);

      expect(result.ok && result.value.status).toBe('posted');
      expect(scheduler.posts.get(second.id)?.scheduledFor).toBe('2026-01-05T12:00:00');
    });

    it('keeps the post queued when publishing fails', async () => {
      publishers.linkedin.outcomes.push({ success: false, error: 'Rate limited' });
      const post = await enqueued('flaky');

      const result = await scheduler.service.postNow(post.id);

      expect(result).toEqual({ ok: false, code: 'publish_rejected', message: 'Rate limited' });
      expect(scheduler.posts.get(post.id)).toMatchObject({ status: 'pending', scheduledFor: '2026-01-05T12:00:00' });
    });

    it('keeps the post queued when the platform is not connected', async () => {
      credentials.unavailable.set('linkedin', 'LinkedIn not connected');
      const post = await enqueued('offline');

      const result = await scheduler.service.postNow(post.id);

      expect(result).toEqual({ ok: false, code: 'credential_unavailable', message: 'LinkedIn not connected' });
      expect(scheduler.posts.get(post.id)?.status).toBe('pending');
      expect(publishers.linkedin.calls).toHaveLength(0);
    });
  });

  describe('retry', () => {
    it('re-publishes a failed post', async () => {
      const post = await enqueued('second chance');
      scheduler.posts.updateStatus(post.id, 'failed', { error: 'Timeout' });

      const result = await scheduler.service.retry(post.id);

      expect(result.ok && result.value.status).toBe('posted');
    });

    it('prefixes a repeated failure', async () => {
      const post = await enqueued('still broken');
      scheduler.posts.updateStatus(post.id, 'failed', { error: 'Timeout' });
      publishers.linkedin.outcomes.push({ success: false, error: 'Still down' });

      const result = await scheduler.service.retry(post.id);

      expect(result).toEqual({ ok: false, code: 'publish_rejected', message: `${RETRY_ERROR_PREFIX}Still down` });
      expect(scheduler.posts.get(post.id)).toMatchObject({ status: 'failed', errorMessage: 'Retry failed: Still down' });
    });

    it('only retries failed posts', async () => {
      const post = await enqueued('pending');
      const result = await scheduler.service.retry(post.id);
      expect(result).toEqual({ ok: false, code: 'not_pending', message: 'Only failed posts can be retried' });
    });
  });

  describe('queue ordering', () => {
    it('reorders and moves through the materializer', async () => {
      const a = await enqueued('a');
      const b = await enqueued('b');
      const c = await enqueued('c');

      await expect(scheduler.service.reorder([c.id, a.id, b.id])).resolves.toBe(true);
      expect(scheduler.posts.get(c.id)?.scheduledFor).toBe('2026-01-05T12:00:00');

      await expect(scheduler.service.moveToPosition([c.id], 'bottom', 'linkedin')).resolves.toBe(true);
      expect(scheduler.posts.get(c.id)?.scheduledFor).toBe('2026-01-06T09:00:00');
      expect(scheduler.posts.get(a.id)?.scheduledFor).toBe('2026-01-05T12:00:00');
    });

    it('deletes in bulk and clears the pending queue', async () => {
      const a = await enqueued('a');
      const b = await enqueued('b');
      await enqueued('c', 'threads');

      await expect(scheduler.service.deleteBulk([a.id, 'sp_missing'])).resolves.toBe(1);
      await expect(scheduler.service.delete(b.id)).resolves.toBe(true);
      await expect(scheduler.service.clearAllPending()).resolves.toBe(1);
      expect(scheduler.service.summary()).toEqual({ pending: 0, posted: 0, failed: 0, cancelled: 0 });
    });
  });

  describe('slots and limits', () => {
    it('re-packs queues when a slot is added', async () => {
      const post = await enqueued('earlier please');

      const result = await scheduler.service.addSlot({ dayOfWeek: 0, timeOfDay: '10:30' });

      expect(result.ok && result.value.redistributed).toEqual({ linkedin: 1, threads: 0 });
      expect(scheduler.posts.get(post.id)?.scheduledFor).toBe('2026-01-05T10:30:00');
    });

    it('rejects invalid slots and unknown ids', async () => {
      await expect(scheduler.service.addSlot({ dayOfWeek: 0, timeOfDay: '25:00' })).resolves.toEqual({
        ok: false,
        code: 'invalid_request',
        message: 'Invalid time format "25:00". Use HH:MM (24-hour)',
      });
      const toggle = await scheduler.service.toggleSlot('slot_missing');
      expect(toggle.ok).toBe(false);
      if (!toggle.ok) expect(toggle.code).toBe('not_found');
      const removed = await scheduler.service.deleteSlot('slot_missing');
      expect(removed.ok).toBe(false);
      if (!removed.ok) expect(removed.code).toBe('not_found');
    });

    it('moves posts off a deleted slot', async () => {
      const post = await enqueued('on noon');
      const noon = scheduler.slots.list().find(slot => slot.timeOfDay === '12:00');
      expect(noon).toBeDefined();
      if (!noon) return;

      const result = await scheduler.service.deleteSlot(noon.id);

      expect(result).toEqual({ ok: true, value: { linkedin: 1, threads: 0 } });
      expect(scheduler.posts.get(post.id)?.scheduledFor).toBe('2026-01-05T17:00:00');
    });

    it('applies a new daily limit to the existing queue', async () => {
      await enqueued('first');
      const second = await enqueued('second');

      const result = await scheduler.service.setLimit('linkedin', 1);

      expect(result).toEqual({ ok: true, value: { platform: 'linkedin', maxPerDay: 1, redistributed: 2 } });
      expect(scheduler.posts.get(second.id)?.scheduledFor).toBe('2026-01-06T09:00:00');
      expect(scheduler.service.getLimits()).toEqual({ linkedin: 1, threads: 0 });
    });

    it('rejects a negative limit', async () => {
      await expect(scheduler.service.setLimit('threads', -1)).resolves.toEqual({
        ok: false,
        code: 'invalid_request',
        message: 'Daily limit must be a non-negative integer',
      });
    });
  });
});
