/**
 * Queue Materializer
 *
 * Compound operations over pending rows: redistribute (re-pack a platform
 * onto its earliest legal slots in queue order), reorder (permute a fixed
 * set of timestamps) and move-to-position (send rows to the front or back
 * of the timestamp ladder). Terminal rows are never touched.
 */

import type { Logger, Platform, QueuePosition, ScheduledPost } from '../types.js';
import type { ScheduledPostStore } from '../storage/scheduled-post-store.js';
import type { SlotAllocator } from './slot-allocator.js';

export interface MoveOptions {
  /** Restrict the ladder to one platform instead of every pending row. */
  platform?: Platform;
}

export class QueueMaterializer {
  constructor(
    private posts: ScheduledPostStore,
    private allocator: SlotAllocator,
    private logger?: Logger,
  ) {}

  /**
   * Returns how many rows landed on a real slot. Rows the allocator cannot
   * place stay parked at the far-future sentinel.
   */
  redistribute(platform: Platform): number {
    return this.posts.transaction(() => {
      const queue = this.posts.listPendingByCreation(platform);
      if (queue.length === 0) return 0;

      this.posts.parkPending(platform);

      let assigned = 0;
      for (const post of queue) {
        const slot = this.allocator.nextAvailableSlot(platform);
        if (!slot.ok) continue;
        if (this.posts.updateScheduledFor(post.id, slot.value)) assigned++;
      }

      if (assigned < queue.length) {
        this.logger?.warn('Redistribution left posts parked', {
          platform,
          pending: queue.length,
          assigned,
        });
      } else {
        this.logger?.debug('Redistributed queue', { platform, assigned });
      }
      return assigned;
    });
  }

  /**
   * Assigns the sorted timestamps of `postIds` back to them in the given
   * order. All ids must be distinct, pending and on one platform.
   */
  reorder(postIds: readonly string[]): boolean {
    if (postIds.length < 2 || new Set(postIds).size !== postIds.length) return false;

    return this.posts.transaction(() => {
      const rows: ScheduledPost[] = [];
      for (const id of postIds) {
        const post = this.posts.get(id);
        if (!post || post.status !== 'pending') return false;
        rows.push(post);
      }
      if (new Set(rows.map(row => row.platform)).size !== 1) return false;

      const ladder = rows.map(row => row.scheduledFor).sort();
      postIds.forEach((id, index) => {
        this.posts.updateScheduledFor(id, ladder[index]);
      });
      return true;
    });
  }

  /**
   * Sends the selected rows to the top or bottom of the pending queue,
   * reusing the existing timestamp ladder. Without a platform the ladder
   * spans every platform. Parked rows are not part of the ladder. Fails
   * without writing when the new order would put two rows of one platform
   * on the same timestamp.
   */
  moveToPosition(postIds: readonly string[], position: QueuePosition, options: MoveOptions = {}): boolean {
    const wanted = new Set(postIds);
    if (wanted.size === 0) return false;

    return this.posts.transaction(() => {
      const pending = this.posts.listPending(options.platform).filter(post => !post.parked);
      const selected = pending.filter(post => wanted.has(post.id));
      if (selected.length === 0) return false;

      const others = pending.filter(post => !wanted.has(post.id));
      const order = position === 'top' ? [...selected, ...others] : [...others, ...selected];
      const ladder = pending.map(post => post.scheduledFor);

      const claimed = new Set<string>();
      for (const [index, post] of order.entries()) {
        const key = `${post.platform}|${ladder[index]}`;
        if (claimed.has(key)) {
          this.logger?.warn('Move rejected: timestamp collision', { position, scheduledFor: ladder[index] });
          return false;
        }
        claimed.add(key);
      }

      order.forEach((post, index) => {
        if (post.scheduledFor !== ladder[index]) {
          this.posts.updateScheduledFor(post.id, ladder[index]);
        }
      });
      return true;
    });
  }
}
