/**
 * Scheduling Queue — Core Type Definitions
 */

// ─── Platforms ────────────────────────────────────────────────

export const PLATFORMS = ['linkedin', 'threads'] as const;

export type Platform = typeof PLATFORMS[number];

export function isPlatform(value: unknown): value is Platform {
  return typeof value === 'string' && (PLATFORMS as readonly string[]).includes(value);
}

export const PLATFORM_LABELS: Record<Platform, string> = {
  linkedin: 'LinkedIn',
  threads: 'Threads',
};

// ─── Time Slots ───────────────────────────────────────────────

/** Sentinel day-of-week meaning "every day". */
export const ALL_DAYS = -1;

/** 0 = Monday … 6 = Sunday, or ALL_DAYS. */
export type DayOfWeek = -1 | 0 | 1 | 2 | 3 | 4 | 5 | 6;

export interface TimeSlot {
  id: string;
  dayOfWeek: DayOfWeek;
  timeOfDay: string;   // zero-padded HH:MM, local clock
  enabled: boolean;
  createdAt: string;
}

export interface PlatformDailyLimit {
  platform: Platform;
  maxPerDay: number;   // 0 = unlimited
}

// ─── Scheduled Posts ──────────────────────────────────────────

export type ContentRef =
  | { kind: 'social'; socialPostId: string }
  | { kind: 'article'; articleId: string }
  | { kind: 'standalone'; standalonePostId: string };

export type ContentKind = ContentRef['kind'];

export const CONTENT_KINDS = ['social', 'article', 'standalone'] as const satisfies readonly ContentKind[];

export type ScheduledPostStatus = 'pending' | 'posted' | 'failed' | 'cancelled';

export const SCHEDULED_POST_STATUSES: readonly ScheduledPostStatus[] = ['pending', 'posted', 'failed', 'cancelled'];

export interface PublishReceipt {
  postId: string;
  postUrl?: string;
}

export interface ScheduledPost {
  id: string;
  content: ContentRef;
  platform: Platform;
  scheduledFor: string;   // local yyyy-MM-ddTHH:mm:ss
  status: ScheduledPostStatus;
  publishResult?: PublishReceipt;
  errorMessage?: string;
  createdAt: string;
  postedAt?: string;
  /** True when redistribution could not place the row inside the lookahead horizon. */
  parked: boolean;
}

export type QueuePosition = 'top' | 'bottom';

// ─── Results ──────────────────────────────────────────────────

export type SchedulingFailureCode =
  | 'no_slots_configured'
  | 'no_available_slot'
  | 'not_pending'
  | 'not_found'
  | 'not_in_future'
  | 'slot_taken'
  | 'content_missing'
  | 'credential_unavailable'
  | 'publish_rejected'
  | 'invalid_request';

export interface SchedulingFailure {
  ok: false;
  code: SchedulingFailureCode;
  message: string;
}

export type SchedulingResult<T> = { ok: true; value: T } | SchedulingFailure;

export function succeed<T>(value: T): SchedulingResult<T> {
  return { ok: true, value };
}

export function fail(code: SchedulingFailureCode, message: string): SchedulingFailure {
  return { ok: false, code, message };
}

// ─── Collaborators ────────────────────────────────────────────

export interface ResolvedContent {
  text: string;
  imageUrl?: string;
  title?: string;
}

export interface ContentResolver {
  resolveContent(ref: ContentRef): ResolvedContent | null;
}

export interface UsageMarker {
  markUsed(ref: ContentRef): void;
}

export interface Clock {
  now(): Date;
}

export interface Logger {
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
  debug(msg: string, meta?: Record<string, unknown>): void;
}
