import { PLATFORMS, type Platform } from '../types.js';
import type { SqliteDatabase } from './database.js';

export class DailyLimitStore {
  constructor(private db: SqliteDatabase) {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS platform_daily_limits (
        platform TEXT PRIMARY KEY,
        max_per_day INTEGER NOT NULL DEFAULT 0
      );
    `);
  }

  /** 0 means unlimited, and is also the answer for a platform with no row. */
  getLimit(platform: Platform): number {
    const row = this.db
      .prepare('SELECT max_per_day FROM platform_daily_limits WHERE platform = ?')
      .get(platform) as { max_per_day: number } | undefined;
    return row?.max_per_day ?? 0;
  }

  setLimit(platform: Platform, maxPerDay: number): void {
    if (!Number.isInteger(maxPerDay) || maxPerDay < 0) {
      throw new RangeError(`Daily limit must be a non-negative integer, got ${maxPerDay}`);
    }
    this.db.prepare(`
      INSERT INTO platform_daily_limits (platform, max_per_day)
      VALUES (?, ?)
      ON CONFLICT(platform) DO UPDATE SET max_per_day = excluded.max_per_day
    `).run(platform, maxPerDay);
  }

  listAll(): Record<Platform, number> {
    const limits: Record<Platform, number> = { linkedin: 0, threads: 0 };
    const rows = this.db.prepare('SELECT platform, max_per_day FROM platform_daily_limits').all() as Array<{
      platform: string;
      max_per_day: number;
    }>;
    for (const row of rows) {
      const platform = PLATFORMS.find(p => p === row.platform);
      if (platform) limits[platform] = row.max_per_day;
    }
    return limits;
  }
}
