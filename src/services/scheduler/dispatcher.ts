/**
 * Dispatcher — the publish flow shared by the worker, post-now and retry.
 *
 * content → credential → platform publish → status update → mark used.
 * Callers hold the platform lock, which orders work inside one process. The
 * row claim in the database keeps a second process sharing the file from
 * publishing the same row.
 */

import { nanoid } from 'nanoid';
import {
  fail,
  succeed,
  type ContentResolver,
  type Logger,
  type Platform,
  type ResolvedContent,
  type ScheduledPost,
  type SchedulingResult,
  type UsageMarker,
} from '../../core/types.js';
import { truncateError, type ScheduledPostStore } from '../../core/storage/scheduled-post-store.js';
import type { CredentialProvider, CredentialResult } from '../social/credentials.js';
import type { PlatformCredential, PublishOutcome, PublisherRegistry } from '../social/types.js';

export const CONTENT_MISSING_ERROR = 'No content found';

/** Credential lookups shared across the rows of one tick. */
export type CredentialCache = Map<Platform, Promise<CredentialResult>>;

export interface DispatcherDeps {
  posts: ScheduledPostStore;
  content: ContentResolver;
  usage: UsageMarker;
  credentials: CredentialProvider;
  publishers: PublisherRegistry;
  logger: Logger;
}

export interface PublishOptions {
  errorPrefix?: string;
  keepPendingOnFailure?: boolean;
}

export interface PreparedPublish {
  content: ResolvedContent;
  credential: PlatformCredential;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class Dispatcher {
  /** Claim owner for every row this dispatcher publishes. */
  readonly owner = `dispatch_${nanoid(10)}`;

  constructor(private deps: DispatcherDeps) {}

  /** Resolves content and credential without touching the row. */
  async prepare(post: ScheduledPost, cache?: CredentialCache): Promise<SchedulingResult<PreparedPublish>> {
    const content = this.deps.content.resolveContent(post.content);
    if (!content) {
      return fail('content_missing', CONTENT_MISSING_ERROR);
    }

    const credential = await this.credentialFor(post.platform, cache);
    if (!credential.ok) {
      return fail('credential_unavailable', credential.error);
    }
    return succeed({ content, credential: credential.credential });
  }

  /**
   * Full flow for a pending row. Preparation failures mark the row failed
   * with the reason; nothing is thrown for provider errors.
   */
  async dispatch(post: ScheduledPost, cache?: CredentialCache): Promise<SchedulingResult<ScheduledPost>> {
    const current = this.deps.posts.get(post.id);
    if (!current || current.status !== 'pending') {
      return fail('not_pending', `Scheduled post ${post.id} is no longer pending`);
    }
    if (!this.deps.posts.claim(current.id, this.owner)) {
      return this.claimedElsewhere(current);
    }

    const prepared = await this.prepare(current, cache);
    if (!prepared.ok) {
      this.deps.posts.updateStatus(current.id, 'failed', { error: prepared.message });
      this.deps.logger.warn('Scheduled post failed before publish', {
        postId: current.id,
        platform: current.platform,
        reason: prepared.message,
      });
      return prepared;
    }
    return this.publishPrepared(current, prepared.value);
  }

  /**
   * Publishes a pending row whose content and credential are already known.
   * A failure is stored as `errorPrefix + provider error`, unless
   * `keepPendingOnFailure` leaves the row queued for its slot.
   */
  async publishPrepared(
    post: ScheduledPost,
    prepared: PreparedPublish,
    options: PublishOptions = {},
  ): Promise<SchedulingResult<ScheduledPost>> {
    if (!this.deps.posts.claim(post.id, this.owner)) {
      return this.claimedElsewhere(post);
    }
    const outcome = await this.publish(post.platform, prepared);

    if (!outcome.success) {
      const error = `${options.errorPrefix ?? ''}${outcome.error}`;
      if (options.keepPendingOnFailure) {
        this.deps.posts.release(post.id, this.owner);
      } else {
        this.deps.posts.updateStatus(post.id, 'failed', { error });
      }
      this.deps.logger.error('Scheduled post failed', {
        postId: post.id,
        platform: post.platform,
        error: truncateError(error),
      });
      return fail('publish_rejected', error);
    }

    const updated = this.deps.posts.updateStatus(post.id, 'posted', {
      result: outcome.postUrl ? { postId: outcome.postId, postUrl: outcome.postUrl } : { postId: outcome.postId },
    });
    if (!updated) {
      return fail('not_found', `Scheduled post ${post.id} disappeared while publishing`);
    }
    this.deps.logger.info('Scheduled post published', {
      postId: post.id,
      platform: post.platform,
      externalId: outcome.postId,
    });

    try {
      this.deps.usage.markUsed(post.content);
    } catch (err) {
      this.deps.logger.warn('Failed to mark content used', { postId: post.id, error: errorMessage(err) });
    }
    return succeed(updated);
  }

  private claimedElsewhere(post: ScheduledPost): SchedulingResult<ScheduledPost> {
    this.deps.logger.info('Scheduled post skipped: claimed by another publisher', {
      postId: post.id,
      platform: post.platform,
    });
    return fail('not_pending', `Scheduled post ${post.id} is already being published`);
  }

  private async publish(platform: Platform, prepared: PreparedPublish): Promise<PublishOutcome> {
    const input = {
      text: prepared.content.text,
      ...(prepared.content.imageUrl ? { imageUrl: prepared.content.imageUrl } : {}),
      ...(prepared.content.title ? { title: prepared.content.title } : {}),
    };
    try {
      return await this.deps.publishers[platform].publish(prepared.credential, input);
    } catch (err) {
      return { success: false, error: errorMessage(err) };
    }
  }

  private credentialFor(platform: Platform, cache?: CredentialCache): Promise<CredentialResult> {
    const cached = cache?.get(platform);
    if (cached) return cached;
    const lookup = this.deps.credentials.ensureValidToken(platform).catch((err: unknown): CredentialResult => ({
      ok: false,
      error: `${platform} credential check failed: ${errorMessage(err)}`,
    }));
    cache?.set(platform, lookup);
    return lookup;
  }
}
