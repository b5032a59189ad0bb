/**
 * Threads Publishing Client
 *
 * Two-step publish on graph.threads.net: create a media container
 * (TEXT or IMAGE), wait for it to finish processing, publish it, then look
 * up the permalink. Long-lived tokens are extended with `th_refresh_token`.
 *
 * Image posts need a publicly reachable image URL.
 */

import type { Logger } from '../../core/types.js';
import type { StoredToken } from '../../core/storage/token-store.js';
import { errorPayload, numberField, requestJson, stringField } from './http.js';
import type { PlatformCredential, PlatformPublisher, PublishInput, PublishOutcome, RefreshOutcome } from './types.js';

export const THREADS_MAX_TEXT_LENGTH = 500;
export const THREADS_EXPIRY_BUFFER_MS = 60 * 60_000;

const API_BASE = 'https://graph.threads.net';

export interface ThreadsPollOptions {
  maxAttempts?: number;
  intervalMs?: number;
}

export function truncateForThreads(text: string): string {
  return text.length > THREADS_MAX_TEXT_LENGTH ? `${text.slice(0, THREADS_MAX_TEXT_LENGTH - 3)}...` : text;
}

function withQuery(path: string, params: Record<string, string | undefined>): string {
  const filtered: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) filtered[key] = value;
  }
  return `${API_BASE}${path}?${new URLSearchParams(filtered).toString()}`;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class ThreadsPublisher implements PlatformPublisher {
  readonly platform = 'threads' as const;
  readonly expiryBufferMs = THREADS_EXPIRY_BUFFER_MS;

  private maxAttempts: number;
  private intervalMs: number;

  constructor(
    private logger?: Logger,
    poll: ThreadsPollOptions = {},
    private now: () => Date = () => new Date(),
  ) {
    this.maxAttempts = poll.maxAttempts ?? 10;
    this.intervalMs = poll.intervalMs ?? 500;
  }

  isUsable(token: StoredToken): boolean {
    return Boolean(token.accessToken);
  }

  /** Threads refreshes with the still-valid access token itself. */
  canRefresh(token: StoredToken): boolean {
    return Boolean(token.accessToken);
  }

  async refresh(token: StoredToken): Promise<RefreshOutcome> {
    const result = await requestJson({
      method: 'GET',
      url: withQuery('/refresh_access_token', { grant_type: 'th_refresh_token', access_token: token.accessToken }),
    });
    const accessToken = stringField(result.data, 'access_token');
    if (!result.ok || !accessToken) {
      this.logger?.warn('Threads token refresh failed', { status: result.status, error: result.error });
      return { ok: false, error: result.error ?? 'No access token in refresh response' };
    }

    const refreshed: StoredToken = { ...token, accessToken };
    const expiresIn = numberField(result.data, 'expires_in');
    if (expiresIn !== undefined) {
      refreshed.expiresAt = new Date(this.now().getTime() + expiresIn * 1000).toISOString();
    }
    this.logger?.info('Threads token refreshed');
    return { ok: true, token: refreshed };
  }

  async publish(credential: PlatformCredential, input: PublishInput): Promise<PublishOutcome> {
    const accessToken = credential.accessToken;
    const text = truncateForThreads(input.text);
    if (text !== input.text) {
      this.logger?.warn('Threads post truncated', { limit: THREADS_MAX_TEXT_LENGTH });
    }

    const container = await requestJson({
      method: 'POST',
      url: withQuery('/me/threads', {
        text,
        media_type: input.imageUrl ? 'IMAGE' : 'TEXT',
        image_url: input.imageUrl,
        access_token: accessToken,
      }),
    });
    const containerId = stringField(container.data, 'id');
    if (!container.ok) {
      this.logger?.error('Threads container creation failed', { status: container.status, error: container.error });
      return { success: false, error: errorPayload(container, 'Threads container creation failed') };
    }
    if (!containerId) {
      return { success: false, error: 'No container ID returned' };
    }

    const ready = await this.waitForContainer(containerId, accessToken);
    if (!ready.success) return ready;

    const published = await requestJson({
      method: 'POST',
      url: withQuery('/me/threads_publish', { creation_id: containerId, access_token: accessToken }),
    });
    if (!published.ok) {
      this.logger?.error('Threads publish failed', { status: published.status, error: published.error });
      return { success: false, error: errorPayload(published, 'Threads publish failed') };
    }

    const postId = stringField(published.data, 'id') ?? containerId;
    const details = await requestJson({
      method: 'GET',
      url: withQuery(`/${postId}`, { fields: 'permalink,shortcode', access_token: accessToken }),
      timeoutMs: 10_000,
    });
    const permalink = details.ok ? stringField(details.data, 'permalink') : undefined;
    if (!details.ok) {
      this.logger?.warn('Threads permalink lookup failed', { postId, error: details.error });
    }

    this.logger?.info('Threads post published', { id: postId });
    return permalink ? { success: true, postId, postUrl: permalink } : { success: true, postId };
  }

  /**
   * Polls until the container reports FINISHED. Terminal container states
   * fail the publish; running out of attempts publishes anyway.
   */
  private async waitForContainer(containerId: string, accessToken: string): Promise<PublishOutcome> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const status = await requestJson({
        method: 'GET',
        url: withQuery(`/${containerId}`, { fields: 'status,error_message', access_token: accessToken }),
        timeoutMs: 10_000,
      });

      const state = status.ok ? stringField(status.data, 'status') : undefined;
      switch (state) {
        case 'FINISHED':
          return { success: true, postId: containerId };
        case 'ERROR':
          return { success: false, error: stringField(status.data, 'error_message') ?? 'Container processing failed' };
        case 'EXPIRED':
          return { success: false, error: 'Container expired before publishing' };
        case 'PUBLISHED':
          return { success: false, error: 'Container already published' };
        default:
          this.logger?.debug('Threads container not ready', { containerId, attempt, state: state ?? null });
          if (attempt < this.maxAttempts) await sleep(this.intervalMs);
      }
    }

    this.logger?.warn('Threads container not ready; publishing anyway', { containerId, attempts: this.maxAttempts });
    return { success: true, postId: containerId };
  }
}
