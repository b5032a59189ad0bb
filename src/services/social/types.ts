import type { Platform } from '../../core/types.js';
import type { StoredToken } from '../../core/storage/token-store.js';

/** A usable credential, produced by the credential manager. */
export interface PlatformCredential {
  platform: Platform;
  accessToken: string;
  accountId?: string;
}

export interface PublishInput {
  text: string;
  imageUrl?: string;
  title?: string;
}

export type PublishOutcome =
  | { success: true; postId: string; postUrl?: string }
  | { success: false; error: string };

export type RefreshOutcome =
  | { ok: true; token: StoredToken }
  | { ok: false; error: string };

export interface PlatformPublisher {
  readonly platform: Platform;
  /** Tokens expiring within this window are refreshed before use. */
  readonly expiryBufferMs: number;
  /** Whether a stored token carries what this platform needs to publish. */
  isUsable(token: StoredToken): boolean;
  canRefresh(token: StoredToken): boolean;
  refresh(token: StoredToken): Promise<RefreshOutcome>;
  publish(credential: PlatformCredential, input: PublishInput): Promise<PublishOutcome>;
}

export type PublisherRegistry = Record<Platform, PlatformPublisher>;
