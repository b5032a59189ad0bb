import { nanoid } from 'nanoid';
import { ALL_DAYS, type DayOfWeek, type TimeSlot } from '../types.js';
import { TimeSlotValidationError } from '../errors.js';
import { toLocalTimestamp } from '../clock.js';
import type { SqliteDatabase } from './database.js';

type TimeSlotRow = {
  id: string;
  day_of_week: number;
  time_of_day: string;
  enabled: number;
  created_at: string;
};

export const DEFAULT_SLOT_TIMES = ['09:00', '12:00', '17:00'] as const;

export const DAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'] as const;

export function dayLabel(dayOfWeek: DayOfWeek): string {
  return dayOfWeek === ALL_DAYS ? 'Every day' : DAY_NAMES[dayOfWeek];
}

export function isDayOfWeek(value: unknown): value is DayOfWeek {
  return typeof value === 'number' && Number.isInteger(value) && value >= ALL_DAYS && value <= 6;
}

/**
 * Accepts `H:MM` or `HH:MM` (24-hour) and returns the zero-padded form,
 * or null when the value is not a valid time of day.
 */
export function normalizeTimeOfDay(raw: string): string | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(raw.trim());
  if (!match) return null;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}

function requireDay(value: number): DayOfWeek {
  if (!isDayOfWeek(value)) {
    throw new TimeSlotValidationError(`Invalid day of week: ${value}`);
  }
  return value;
}

function requireTime(value: string): string {
  const normalized = normalizeTimeOfDay(value);
  if (!normalized) {
    throw new TimeSlotValidationError(`Invalid time format "${value}". Use HH:MM (24-hour)`);
  }
  return normalized;
}

export class TimeSlotStore {
  constructor(private db: SqliteDatabase, private now: () => Date = () => new Date()) {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schedule_time_slots (
        id TEXT PRIMARY KEY,
        day_of_week INTEGER NOT NULL,
        time_of_day TEXT NOT NULL,
        enabled INTEGER NOT NULL DEFAULT 1,
        created_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_time_slots_order ON schedule_time_slots(day_of_week, time_of_day);
    `);
  }

  /** Ordered by day-of-week then time-of-day; ALL_DAYS rows come first. */
  list(): TimeSlot[] {
    const rows = this.db.prepare(`
      SELECT * FROM schedule_time_slots
      ORDER BY day_of_week ASC, time_of_day ASC, created_at ASC, rowid ASC
    `).all() as TimeSlotRow[];
    return rows.map(row => this.rowToSlot(row));
  }

  listEnabled(): TimeSlot[] {
    const rows = this.db.prepare(`
      SELECT * FROM schedule_time_slots
      WHERE enabled = 1
      ORDER BY day_of_week ASC, time_of_day ASC, created_at ASC, rowid ASC
    `).all() as TimeSlotRow[];
    return rows.map(row => this.rowToSlot(row));
  }

  get(id: string): TimeSlot | undefined {
    const row = this.db.prepare('SELECT * FROM schedule_time_slots WHERE id = ?').get(id) as TimeSlotRow | undefined;
    return row ? this.rowToSlot(row) : undefined;
  }

  add(input: { dayOfWeek: number; timeOfDay: string; enabled?: boolean }): TimeSlot {
    const slot: TimeSlot = {
      id: `slot_${nanoid(10)}`,
      dayOfWeek: requireDay(input.dayOfWeek),
      timeOfDay: requireTime(input.timeOfDay),
      enabled: input.enabled ?? true,
      createdAt: toLocalTimestamp(this.now()),
    };
    this.db.prepare(`
      INSERT INTO schedule_time_slots (id, day_of_week, time_of_day, enabled, created_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(slot.id, slot.dayOfWeek, slot.timeOfDay, slot.enabled ? 1 : 0, slot.createdAt);
    return slot;
  }

  update(id: string, fields: { dayOfWeek?: number; timeOfDay?: string; enabled?: boolean }): TimeSlot | undefined {
    const existing = this.get(id);
    if (!existing) return undefined;

    const next: TimeSlot = {
      ...existing,
      dayOfWeek: fields.dayOfWeek === undefined ? existing.dayOfWeek : requireDay(fields.dayOfWeek),
      timeOfDay: fields.timeOfDay === undefined ? existing.timeOfDay : requireTime(fields.timeOfDay),
      enabled: fields.enabled ?? existing.enabled,
    };
    this.db.prepare(`
      UPDATE schedule_time_slots SET day_of_week = ?, time_of_day = ?, enabled = ?
      WHERE id = ?
    `).run(next.dayOfWeek, next.timeOfDay, next.enabled ? 1 : 0, id);
    return next;
  }

  toggle(id: string): TimeSlot | undefined {
    const existing = this.get(id);
    if (!existing) return undefined;
    return this.update(id, { enabled: !existing.enabled });
  }

  delete(id: string): boolean {
    return this.db.prepare('DELETE FROM schedule_time_slots WHERE id = ?').run(id).changes > 0;
  }

  /** Creates every-day slots at the default times when nothing is configured yet. */
  seedDefaults(): TimeSlot[] {
    const count = this.db.prepare('SELECT COUNT(*) AS n FROM schedule_time_slots').get() as { n: number };
    if (count.n > 0) return [];
    return DEFAULT_SLOT_TIMES.map(timeOfDay => this.add({ dayOfWeek: ALL_DAYS, timeOfDay }));
  }

  private rowToSlot(row: TimeSlotRow): TimeSlot {
    return {
      id: row.id,
      dayOfWeek: requireDay(row.day_of_week),
      timeOfDay: row.time_of_day,
      enabled: row.enabled === 1,
      createdAt: row.created_at,
    };
  }
}
