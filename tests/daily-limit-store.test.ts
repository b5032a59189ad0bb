import { join } from 'path';
import { mkdirSync, rmSync } from 'fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { openDatabase, type SqliteDatabase } from '../src/core/storage/database.js';
import { DailyLimitStore } from '../src/core/storage/daily-limit-store.js';

const TEST_ROOT = join(import.meta.dirname ?? '.', '__daily_limit_store_test_tmp__');

describe('DailyLimitStore', () => {
  let db: SqliteDatabase;
  let store: DailyLimitStore;

  beforeEach(() => {
    rmSync(TEST_ROOT, { recursive: true, force: true });
    mkdirSync(TEST_ROOT, { recursive: true });
    db = openDatabase(join(TEST_ROOT, 'scheduler.db'));
    store = new DailyLimitStore(db);
  });

  afterEach(() => {
    db.close();
    rmSync(TEST_ROOT, { recursive: true, force: true });
  });

  it('treats a platform without a row as unlimited', () => {
    expect(store.getLimit('linkedin')).toBe(0);
    expect(store.listAll()).toEqual({ linkedin: 0, threads: 0 });
  });

  it('upserts limits per platform', () => {
    store.setLimit('threads', 3);
    store.setLimit('threads', 2);
    store.setLimit('linkedin', 1);

    expect(store.getLimit('threads')).toBe(2);
    expect(store.listAll()).toEqual({ linkedin: 1, threads: 2 });
  });

  it('rejects negative and fractional limits', () => {
    expect(() => store.setLimit('linkedin', -1)).toThrow(RangeError);
    expect(() => store.setLimit('linkedin', 1.5)).toThrow(RangeError);
    expect(store.getLimit('linkedin')).toBe(0);
  });
});
