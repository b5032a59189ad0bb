import { format, isValid, parseISO } from 'date-fns';
import type { Clock } from './types.js';

/** Stored timestamps are local wall-clock, offset-free and fixed width, so they sort lexically. */
export const LOCAL_TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";
export const LOCAL_DATE_FORMAT = 'yyyy-MM-dd';

/** Parked rows sit here until an operator or a later redistribution finds them a slot. */
export const FAR_FUTURE = '9999-12-31T23:59:59';

/** Skew allowed when checking that a user-chosen time is in the future. */
export const FUTURE_TOLERANCE_MS = 60_000;

export const systemClock: Clock = {
  now: () => new Date(),
};

export function fixedClock(at: Date): Clock & { set(next: Date): void; advance(ms: number): void } {
  let current = new Date(at.getTime());
  return {
    now: () => new Date(current.getTime()),
    set: (next: Date) => {
      current = new Date(next.getTime());
    },
    advance: (ms: number) => {
      current = new Date(current.getTime() + ms);
    },
  };
}

export function toLocalTimestamp(date: Date): string {
  return format(date, LOCAL_TIMESTAMP_FORMAT);
}

export function toLocalDate(date: Date): string {
  return format(date, LOCAL_DATE_FORMAT);
}

/**
 * Parses an ISO-8601 string. Offset-free values are read as local time;
 * values with `Z` or an offset are converted to the local wall clock.
 */
export function parseTimestamp(raw: string): Date | null {
  const parsed = parseISO(raw.trim());
  return isValid(parsed) ? parsed : null;
}

export function isFutureEnough(at: Date, now: Date, toleranceMs: number = FUTURE_TOLERANCE_MS): boolean {
  return at.getTime() > now.getTime() - toleranceMs;
}
