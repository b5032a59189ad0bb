import { nanoid } from 'nanoid';
import {
  SCHEDULED_POST_STATUSES,
  type ContentRef,
  type Platform,
  type PublishReceipt,
  type ScheduledPost,
  type ScheduledPostStatus,
} from '../types.js';
import { FAR_FUTURE, toLocalTimestamp } from '../clock.js';
import { InvalidStatusTransitionError } from '../errors.js';
import type { SqliteDatabase } from './database.js';

type ScheduledPostRow = {
  id: string;
  post_type: string;
  social_post_id: string | null;
  article_id: string | null;
  standalone_post_id: string | null;
  platform: Platform;
  scheduled_for: string;
  status: ScheduledPostStatus;
  result_json: string | null;
  error_message: string | null;
  created_at: string;
  posted_at: string | null;
  claimed_by: string | null;
  claimed_at: string | null;
};

const ALLOWED_TRANSITIONS: Record<ScheduledPostStatus, readonly ScheduledPostStatus[]> = {
  pending: ['posted', 'failed', 'cancelled'],
  failed: ['pending'],
  posted: [],
  cancelled: [],
};

export const MAX_ERROR_LENGTH = 500;

/** A publish claim older than this is treated as abandoned. */
export const CLAIM_TTL_MS = 10 * 60_000;

const UNCLAIMED = '(claimed_by IS NULL OR claimed_at < ?)';

export function truncateError(message: string, max: number = MAX_ERROR_LENGTH): string {
  return message.length > max ? message.slice(0, max) : message;
}

function contentColumns(ref: ContentRef): {
  socialPostId: string | null;
  articleId: string | null;
  standalonePostId: string | null;
} {
  switch (ref.kind) {
    case 'social':
      return { socialPostId: ref.socialPostId, articleId: null, standalonePostId: null };
    case 'article':
      return { socialPostId: null, articleId: ref.articleId, standalonePostId: null };
    case 'standalone':
      return { socialPostId: null, articleId: null, standalonePostId: ref.standalonePostId };
  }
}

function contentColumnFor(kind: ContentRef['kind']): string {
  switch (kind) {
    case 'social': return 'social_post_id';
    case 'article': return 'article_id';
    case 'standalone': return 'standalone_post_id';
  }
}

export function contentIdOf(ref: ContentRef): string {
  switch (ref.kind) {
    case 'social': return ref.socialPostId;
    case 'article': return ref.articleId;
    case 'standalone': return ref.standalonePostId;
  }
}

export function contentRefOf(kind: ContentRef['kind'], id: string): ContentRef {
  switch (kind) {
    case 'social': return { kind, socialPostId: id };
    case 'article': return { kind, articleId: id };
    case 'standalone': return { kind, standalonePostId: id };
  }
}

function parseReceipt(raw: string | null): PublishReceipt | undefined {
  if (!raw) return undefined;
  try {
    const parsed: unknown = JSON.parse(raw);
    if (!parsed || typeof parsed !== 'object') return undefined;
    const postId = 'postId' in parsed ? parsed.postId : undefined;
    const postUrl = 'postUrl' in parsed ? parsed.postUrl : undefined;
    if (typeof postId !== 'string') return undefined;
    return typeof postUrl === 'string' ? { postId, postUrl } : { postId };
  } catch {
    return undefined;
  }
}

export interface CreateScheduledPostInput {
  content: ContentRef;
  platform: Platform;
  scheduledFor: string;
  /** Only `posted` is accepted besides the default, to record history. */
  status?: 'pending' | 'posted';
  publishResult?: PublishReceipt;
}

export class ScheduledPostStore {
  constructor(private db: SqliteDatabase, private now: () => Date = () => new Date()) {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS scheduled_posts (
        id TEXT PRIMARY KEY,
        post_type TEXT NOT NULL,
        social_post_id TEXT,
        article_id TEXT,
        standalone_post_id TEXT,
        platform TEXT NOT NULL,
        scheduled_for TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending',
        result_json TEXT,
        error_message TEXT,
        created_at TEXT NOT NULL,
        posted_at TEXT,
        claimed_by TEXT,
        claimed_at TEXT,
        CHECK (
          (post_type = 'social' AND social_post_id IS NOT NULL AND article_id IS NULL AND standalone_post_id IS NULL)
          OR (post_type = 'article' AND article_id IS NOT NULL AND social_post_id IS NULL AND standalone_post_id IS NULL)
          OR (post_type = 'standalone' AND standalone_post_id IS NOT NULL AND social_post_id IS NULL AND article_id IS NULL)
        )
      );
      CREATE INDEX IF NOT EXISTS idx_scheduled_posts_queue ON scheduled_posts(platform, status, scheduled_for);
      CREATE INDEX IF NOT EXISTS idx_scheduled_posts_created ON scheduled_posts(created_at);
    `);
  }

  /**
   * Persists a row as given. Whether a pending row's time is in the future
   * is the caller's concern, so history can be backdated.
   */
  create(input: CreateScheduledPostInput): ScheduledPost {
    const id = `sp_${nanoid(12)}`;
    const status = input.status ?? 'pending';
    const now = this.now();
    const columns = contentColumns(input.content);

    this.db.prepare(`
      INSERT INTO scheduled_posts (
        id, post_type, social_post_id, article_id, standalone_post_id,
        platform, scheduled_for, status, result_json, error_message, created_at, posted_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, NULL, ?, ?)
    `).run(
      id,
      input.content.kind,
      columns.socialPostId,
      columns.articleId,
      columns.standalonePostId,
      input.platform,
      input.scheduledFor,
      status,
      input.publishResult ? JSON.stringify(input.publishResult) : null,
      toLocalTimestamp(now),
      status === 'posted' ? toLocalTimestamp(now) : null,
    );

    const created = this.get(id);
    if (!created) throw new Error(`Scheduled post ${id} not found after insert`);
    return created;
  }

  get(id: string): ScheduledPost | undefined {
    const row = this.db.prepare('SELECT * FROM scheduled_posts WHERE id = ?').get(id) as ScheduledPostRow | undefined;
    return row ? this.rowToPost(row) : undefined;
  }

  list(filters?: { status?: ScheduledPostStatus; platform?: Platform; limit?: number }): ScheduledPost[] {
    const where: string[] = [];
    const params: unknown[] = [];

    if (filters?.status) {
      where.push('status = ?');
      params.push(filters.status);
    }
    if (filters?.platform) {
      where.push('platform = ?');
      params.push(filters.platform);
    }

    const limit = filters?.limit ? `LIMIT ${Math.max(1, Math.floor(filters.limit))}` : '';
    const rows = this.db.prepare(`
      SELECT * FROM scheduled_posts
      ${where.length > 0 ? `WHERE ${where.join(' AND ')}` : ''}
      ORDER BY scheduled_for ASC, created_at ASC, rowid ASC
      ${limit}
    `).all(...params) as ScheduledPostRow[];
    return rows.map(row => this.rowToPost(row));
  }

  listPending(platform?: Platform): ScheduledPost[] {
    return this.list({ status: 'pending', platform });
  }

  /** Unclaimed pending rows in the order they were queued. */
  listPendingByCreation(platform: Platform): ScheduledPost[] {
    const rows = this.db.prepare(`
      SELECT * FROM scheduled_posts
      WHERE platform = ? AND status = 'pending' AND ${UNCLAIMED}
      ORDER BY created_at ASC, rowid ASC
    `).all(platform, this.staleClaimBefore()) as ScheduledPostRow[];
    return rows.map(row => this.rowToPost(row));
  }

  listDue(now: Date, platform?: Platform): ScheduledPost[] {
    const params: unknown[] = [toLocalTimestamp(now)];
    let sql = `SELECT * FROM scheduled_posts WHERE status = 'pending' AND scheduled_for <= ?`;
    if (platform) {
      sql += ' AND platform = ?';
      params.push(platform);
    }
    sql += ' ORDER BY scheduled_for ASC, created_at ASC, rowid ASC';
    return (this.db.prepare(sql).all(...params) as ScheduledPostRow[]).map(row => this.rowToPost(row));
  }

  /** The conflict set: timestamps already claimed by pending rows on a platform. */
  pendingTimes(platform: Platform): Set<string> {
    const rows = this.db.prepare(`
      SELECT scheduled_for FROM scheduled_posts WHERE platform = ? AND status = 'pending'
    `).all(platform) as Array<{ scheduled_for: string }>;
    return new Set(rows.map(row => row.scheduled_for));
  }

  isTimeTaken(platform: Platform, scheduledFor: string, excludeId?: string): boolean {
    const row = this.db.prepare(`
      SELECT 1 FROM scheduled_posts
      WHERE platform = ? AND status = 'pending' AND scheduled_for = ? AND id != ?
      LIMIT 1
    `).get(platform, scheduledFor, excludeId ?? '');
    return row !== undefined;
  }

  /** Pending and posted rows on one calendar date (`yyyy-MM-dd`). */
  countCommittedOnDate(platform: Platform, date: string): number {
    const row = this.db.prepare(`
      SELECT COUNT(*) AS n FROM scheduled_posts
      WHERE platform = ? AND status IN ('pending', 'posted') AND substr(scheduled_for, 1, 10) = ?
    `).get(platform, date) as { n: number };
    return row.n;
  }

  /** Fails for rows that are not pending or are claimed for publishing. */
  updateScheduledFor(id: string, scheduledFor: string): boolean {
    return this.db.prepare(`
      UPDATE scheduled_posts SET scheduled_for = ? WHERE id = ? AND status = 'pending' AND ${UNCLAIMED}
    `).run(scheduledFor, id, this.staleClaimBefore()).changes > 0;
  }

  /**
   * Marks a pending row as being published by `owner`. Only one owner can
   * hold a row at a time, across every process sharing the database file.
   * The same owner may claim again; an expired claim can be taken over.
   */
  claim(id: string, owner: string): boolean {
    return this.db.prepare(`
      UPDATE scheduled_posts SET claimed_by = ?, claimed_at = ?
      WHERE id = ? AND status = 'pending' AND (claimed_by IS NULL OR claimed_by = ? OR claimed_at < ?)
    `).run(owner, toLocalTimestamp(this.now()), id, owner, this.staleClaimBefore()).changes > 0;
  }

  release(id: string, owner: string): void {
    this.db.prepare(`
      UPDATE scheduled_posts SET claimed_by = NULL, claimed_at = NULL WHERE id = ? AND claimed_by = ?
    `).run(id, owner);
  }

  /** Moves every unclaimed pending row of a platform to the far-future sentinel. */
  parkPending(platform: Platform): number {
    return this.db.prepare(`
      UPDATE scheduled_posts SET scheduled_for = ? WHERE platform = ? AND status = 'pending' AND ${UNCLAIMED}
    `).run(FAR_FUTURE, platform, this.staleClaimBefore()).changes;
  }

  updateStatus(
    id: string,
    status: ScheduledPostStatus,
    details: { result?: PublishReceipt; error?: string } = {},
  ): ScheduledPost | undefined {
    const existing = this.get(id);
    if (!existing) return undefined;
    if (!ALLOWED_TRANSITIONS[existing.status].includes(status)) {
      throw new InvalidStatusTransitionError(id, existing.status, status);
    }

    const resultJson = status === 'posted' && details.result ? JSON.stringify(details.result) : null;
    const errorMessage = status === 'failed' ? truncateError(details.error ?? 'Unknown error') : null;
    const postedAt = status === 'posted' ? toLocalTimestamp(this.now()) : null;

    this.db.prepare(`
      UPDATE scheduled_posts
      SET status = ?, result_json = ?, error_message = ?, posted_at = ?, claimed_by = NULL, claimed_at = NULL
      WHERE id = ?
    `).run(status, resultJson, errorMessage, postedAt, id);
    return this.get(id);
  }

  cancel(id: string): boolean {
    return this.db.prepare(`
      UPDATE scheduled_posts SET status = 'cancelled' WHERE id = ? AND status = 'pending' AND ${UNCLAIMED}
    `).run(id, this.staleClaimBefore()).changes > 0;
  }

  /** Cancels the pending row for a piece of content on one platform. */
  cancelBySource(ref: ContentRef, platform: Platform): boolean {
    const column = contentColumnFor(ref.kind);
    return this.db.prepare(`
      UPDATE scheduled_posts SET status = 'cancelled'
      WHERE post_type = ? AND ${column} = ? AND platform = ? AND status = 'pending' AND ${UNCLAIMED}
    `).run(ref.kind, contentIdOf(ref), platform, this.staleClaimBefore()).changes > 0;
  }

  delete(id: string): boolean {
    return this.db.prepare('DELETE FROM scheduled_posts WHERE id = ?').run(id).changes > 0;
  }

  deleteBulk(ids: readonly string[]): number {
    if (ids.length === 0) return 0;
    const placeholders = ids.map(() => '?').join(',');
    return this.db.prepare(`DELETE FROM scheduled_posts WHERE id IN (${placeholders})`).run(...ids).changes;
  }

  clearAllPending(): number {
    return this.db.prepare(`DELETE FROM scheduled_posts WHERE status = 'pending'`).run().changes;
  }

  /** Pending assignments per content id of one kind: `{ [contentId]: { [platform]: scheduledFor } }`. */
  pendingByContent(kind: ContentRef['kind'], contentIds: readonly string[]): Record<string, Partial<Record<Platform, string>>> {
    const result: Record<string, Partial<Record<Platform, string>>> = {};
    for (const row of this.rowsForContent(kind, contentIds, 'pending', 'scheduled_for ASC')) {
      const contentId = contentIdOf(this.rowToContent(row));
      const entry = result[contentId] ?? {};
      entry[row.platform] ??= row.scheduled_for;
      result[contentId] = entry;
    }
    return result;
  }

  /** Most recent publish per platform: `{ [contentId]: { [platform]: { url, postedAt } } }`. */
  postedByContent(
    kind: ContentRef['kind'],
    contentIds: readonly string[],
  ): Record<string, Partial<Record<Platform, { url?: string; postedAt?: string }>>> {
    const result: Record<string, Partial<Record<Platform, { url?: string; postedAt?: string }>>> = {};
    for (const row of this.rowsForContent(kind, contentIds, 'posted', 'posted_at DESC')) {
      const contentId = contentIdOf(this.rowToContent(row));
      const entry = result[contentId] ?? {};
      if (!entry[row.platform]) {
        const receipt = parseReceipt(row.result_json);
        entry[row.platform] = {
          url: receipt?.postUrl ?? receipt?.postId,
          postedAt: row.posted_at ?? undefined,
        };
      }
      result[contentId] = entry;
    }
    return result;
  }

  summary(): Record<ScheduledPostStatus, number> {
    const counts: Record<ScheduledPostStatus, number> = { pending: 0, posted: 0, failed: 0, cancelled: 0 };
    const rows = this.db.prepare('SELECT status, COUNT(*) AS n FROM scheduled_posts GROUP BY status').all() as Array<{
      status: string;
      n: number;
    }>;
    for (const row of rows) {
      const status = SCHEDULED_POST_STATUSES.find(s => s === row.status);
      if (status) counts[status] = row.n;
    }
    return counts;
  }

  /** Runs `fn` inside one SQLite transaction. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  private staleClaimBefore(): string {
    return toLocalTimestamp(new Date(this.now().getTime() - CLAIM_TTL_MS));
  }

  private rowsForContent(
    kind: ContentRef['kind'],
    contentIds: readonly string[],
    status: ScheduledPostStatus,
    orderBy: string,
  ): ScheduledPostRow[] {
    if (contentIds.length === 0) return [];
    const column = contentColumnFor(kind);
    const placeholders = contentIds.map(() => '?').join(',');
    return this.db.prepare(`
      SELECT * FROM scheduled_posts
      WHERE post_type = ? AND ${column} IN (${placeholders}) AND status = ?
      ORDER BY ${orderBy}
    `).all(kind, ...contentIds, status) as ScheduledPostRow[];
  }

  private rowToContent(row: ScheduledPostRow): ContentRef {
    if (row.post_type === 'social' && row.social_post_id) return { kind: 'social', socialPostId: row.social_post_id };
    if (row.post_type === 'article' && row.article_id) return { kind: 'article', articleId: row.article_id };
    if (row.post_type === 'standalone' && row.standalone_post_id) {
      return { kind: 'standalone', standalonePostId: row.standalone_post_id };
    }
    throw new Error(`Scheduled post ${row.id} has no content reference`);
  }

  private rowToPost(row: ScheduledPostRow): ScheduledPost {
    const post: ScheduledPost = {
      id: row.id,
      content: this.rowToContent(row),
      platform: row.platform,
      scheduledFor: row.scheduled_for,
      status: row.status,
      createdAt: row.created_at,
      parked: row.status === 'pending' && row.scheduled_for === FAR_FUTURE,
    };
    const receipt = parseReceipt(row.result_json);
    if (receipt) post.publishResult = receipt;
    if (row.error_message) post.errorMessage = row.error_message;
    if (row.posted_at) post.postedAt = row.posted_at;
    return post;
  }
}
