/**
 * Slot Allocator
 *
 * Finds the earliest legal, unoccupied posting time for a platform:
 * day by day from today across the lookahead horizon, enabled slots in
 * time order within each day, skipping days whose daily cap is reached
 * and times already claimed by a pending post on the same platform.
 */

import { addDays, getISODay, set } from 'date-fns';
import { ALL_DAYS, fail, succeed, type Clock, type Platform, type SchedulingResult, type TimeSlot } from '../types.js';
import { toLocalDate, toLocalTimestamp } from '../clock.js';
import type { TimeSlotStore } from '../storage/time-slot-store.js';
import type { DailyLimitStore } from '../storage/daily-limit-store.js';
import type { ScheduledPostStore } from '../storage/scheduled-post-store.js';

export const LOOKAHEAD_DAYS = 30;

/** 0 = Monday … 6 = Sunday */
export function dayOfWeekOf(date: Date): number {
  return getISODay(date) - 1;
}

function parseTimeOfDay(value: string): { hours: number; minutes: number } | null {
  const match = /^(\d{2}):(\d{2})$/.exec(value);
  if (!match) return null;
  return { hours: Number(match[1]), minutes: Number(match[2]) };
}

export class SlotAllocator {
  constructor(
    private slots: TimeSlotStore,
    private limits: DailyLimitStore,
    private posts: ScheduledPostStore,
    private clock: Clock,
  ) {}

  /**
   * Side-effect free on the store. Returns the local timestamp of the next
   * free slot, or `no_slots_configured` / `no_available_slot`.
   */
  nextAvailableSlot(platform: Platform): SchedulingResult<string> {
    const enabled = this.slots.listEnabled();
    if (enabled.length === 0) {
      return fail('no_slots_configured', 'No posting times are configured. Add a time slot first.');
    }

    const limit = this.limits.getLimit(platform);
    const taken = this.posts.pendingTimes(platform);
    const now = this.clock.now();
    const committedByDate = new Map<string, number>();

    for (let dayOffset = 0; dayOffset < LOOKAHEAD_DAYS; dayOffset++) {
      const day = addDays(now, dayOffset);
      const dateKey = toLocalDate(day);

      if (limit > 0) {
        if (!committedByDate.has(dateKey)) {
          committedByDate.set(dateKey, this.posts.countCommittedOnDate(platform, dateKey));
        }
        if ((committedByDate.get(dateKey) ?? 0) >= limit) continue;
      }

      for (const slot of this.slotsForDay(enabled, dayOfWeekOf(day))) {
        const time = parseTimeOfDay(slot.timeOfDay);
        if (!time) continue;

        const candidate = set(day, { ...time, seconds: 0, milliseconds: 0 });
        if (candidate.getTime() <= now.getTime()) continue;

        const key = toLocalTimestamp(candidate);
        if (taken.has(key)) continue;

        if (limit > 0) {
          committedByDate.set(dateKey, (committedByDate.get(dateKey) ?? 0) + 1);
        }
        return succeed(key);
      }
    }

    return fail('no_available_slot', `No free ${platform} slot in the next ${LOOKAHEAD_DAYS} days.`);
  }

  /** Slots that apply on a weekday, earliest time first. */
  private slotsForDay(enabled: readonly TimeSlot[], dayOfWeek: number): TimeSlot[] {
    return enabled
      .filter(slot => slot.dayOfWeek === ALL_DAYS || slot.dayOfWeek === dayOfWeek)
      .sort((a, b) => a.timeOfDay.localeCompare(b.timeOfDay));
  }
}
