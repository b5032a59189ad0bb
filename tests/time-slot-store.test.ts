import { join } from 'path';
import { mkdirSync, rmSync } from 'fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { openDatabase, type SqliteDatabase } from '../src/core/storage/database.js';
import { TimeSlotStore, dayLabel, normalizeTimeOfDay } from '../src/core/storage/time-slot-store.js';
import { TimeSlotValidationError } from '../src/core/errors.js';
import { ALL_DAYS } from '../src/core/types.js';
import { mondayMorning } from './support.js';

const TEST_ROOT = join(import.meta.dirname ?? '.', '__time_slot_store_test_tmp__');

describe('normalizeTimeOfDay', () => {
  it('pads single-digit hours', () => {
    expect(normalizeTimeOfDay('9:05')).toBe('09:05');
    expect(normalizeTimeOfDay(' 17:30 ')).toBe('17:30');
  });

  it('rejects out-of-range and malformed times', () => {
    expect(normalizeTimeOfDay('24:00')).toBeNull();
    expect(normalizeTimeOfDay('12:60')).toBeNull();
    expect(normalizeTimeOfDay('7:5')).toBeNull();
    expect(normalizeTimeOfDay('noon')).toBeNull();
  });
});

describe('TimeSlotStore', () => {
  let db: SqliteDatabase;
  let store: TimeSlotStore;

  beforeEach(() => {
    rmSync(TEST_ROOT, { recursive: true, force: true });
    mkdirSync(TEST_ROOT, { recursive: true });
    db = openDatabase(join(TEST_ROOT, 'scheduler.db'));
    store = new TimeSlotStore(db, mondayMorning);
  });

  afterEach(() => {
    db.close();
    rmSync(TEST_ROOT, { recursive: true, force: true });
  });

  it('adds slots with normalized times and lists every-day slots first', () => {
    store.add({ dayOfWeek: 2, timeOfDay: '8:00' });
    store.add({ dayOfWeek: ALL_DAYS, timeOfDay: '17:00' });
    store.add({ dayOfWeek: ALL_DAYS, timeOfDay: '09:00' });

    const slots = store.list();
    expect(slots.map(slot => [slot.dayOfWeek, slot.timeOfDay])).toEqual([
      [ALL_DAYS, '09:00'],
      [ALL_DAYS, '17:00'],
      [2, '08:00'],
    ]);
    expect(slots[0].enabled).toBe(true);
    expect(slots[0].createdAt).toBe('2026-01-05T10:00:00');
  });

  it('rejects invalid days and times', () => {
    expect(() => store.add({ dayOfWeek: 7, timeOfDay: '09:00' })).toThrow(TimeSlotValidationError);
    expect(() => store.add({ dayOfWeek: -2, timeOfDay: '09:00' })).toThrow(TimeSlotValidationError);
    expect(() => store.add({ dayOfWeek: 0, timeOfDay: '25:00' })).toThrow('Invalid time format "25:00". Use HH:MM (24-hour)');
    expect(store.list()).toHaveLength(0);
  });

  it('toggles and updates slots, and only lists enabled ones as enabled', () => {
    const morning = store.add({ dayOfWeek: ALL_DAYS, timeOfDay: '09:00' });
    const evening = store.add({ dayOfWeek: ALL_DAYS, timeOfDay: '18:00' });

    expect(store.toggle(morning.id)?.enabled).toBe(false);
    expect(store.listEnabled().map(slot => slot.id)).toEqual([evening.id]);

    const moved = store.update(evening.id, { dayOfWeek: 4, timeOfDay: '6:15' });
    expect(moved).toMatchObject({ dayOfWeek: 4, timeOfDay: '06:15', enabled: true });
    expect(store.get(evening.id)).toEqual(moved);

    expect(store.toggle('slot_missing')).toBeUndefined();
    expect(store.update('slot_missing', { enabled: false })).toBeUndefined();
  });

  it('deletes slots once', () => {
    const slot = store.add({ dayOfWeek: 0, timeOfDay: '12:00' });
    expect(store.delete(slot.id)).toBe(true);
    expect(store.delete(slot.id)).toBe(false);
    expect(store.get(slot.id)).toBeUndefined();
  });

  it('seeds the default times only into an empty registry', () => {
    const seeded = store.seedDefaults();
    expect(seeded.map(slot => slot.timeOfDay)).toEqual(['09:00', '12:00', '17:00']);
    expect(seeded.every(slot => slot.dayOfWeek === ALL_DAYS)).toBe(true);
    expect(store.seedDefaults()).toEqual([]);
    expect(store.list()).toHaveLength(3);
  });

  it('labels days starting from Monday', () => {
    expect(dayLabel(0)).toBe('Monday');
    expect(dayLabel(6)).toBe('Sunday');
    expect(dayLabel(ALL_DAYS)).toBe('Every day');
  });
});
