/**
 * Credential Manager
 *
 * Turns stored OAuth tokens into usable credentials, refreshing tokens that
 * are expired or inside the platform's expiry buffer.
 */

import { PLATFORM_LABELS, type Clock, type Logger, type Platform } from '../../core/types.js';
import type { StoredToken, TokenStore } from '../../core/storage/token-store.js';
import type { PlatformCredential, PublisherRegistry } from './types.js';

export type CredentialResult =
  | { ok: true; credential: PlatformCredential }
  | { ok: false; error: string };

export interface ConnectionStatus {
  connected: boolean;
  expired: boolean;
  expiresAt?: string;
}

export interface CredentialProvider {
  ensureValidToken(platform: Platform): Promise<CredentialResult>;
  status(platform: Platform): ConnectionStatus;
}

/** Unknown or unparseable expiry counts as expired. */
export function isTokenExpired(expiresAt: string | undefined, now: Date, bufferMs: number): boolean {
  if (!expiresAt) return true;
  const expiry = Date.parse(expiresAt);
  if (Number.isNaN(expiry)) return true;
  return now.getTime() >= expiry - bufferMs;
}

export class CredentialManager implements CredentialProvider {
  constructor(
    private tokens: TokenStore,
    private publishers: PublisherRegistry,
    private clock: Clock,
    private logger?: Logger,
  ) {}

  async ensureValidToken(platform: Platform): Promise<CredentialResult> {
    const label = PLATFORM_LABELS[platform];
    const publisher = this.publishers[platform];
    const token = this.tokens.get(platform);
    if (!token || !publisher.isUsable(token)) {
      return { ok: false, error: `${label} not connected` };
    }

    if (!isTokenExpired(token.expiresAt, this.clock.now(), publisher.expiryBufferMs)) {
      return { ok: true, credential: this.toCredential(platform, token) };
    }

    if (!publisher.canRefresh(token)) {
      return { ok: false, error: `${label} token expired` };
    }

    const refreshed = await publisher.refresh(token);
    if (!refreshed.ok) {
      this.logger?.warn('Token refresh failed', { platform, error: refreshed.error });
      return { ok: false, error: `${label} token expired` };
    }

    this.tokens.save(platform, refreshed.token);
    return { ok: true, credential: this.toCredential(platform, refreshed.token) };
  }

  /** Connection state for status endpoints, without refreshing anything. */
  status(platform: Platform): ConnectionStatus {
    const token = this.tokens.get(platform);
    if (!token || !this.publishers[platform].isUsable(token)) return { connected: false, expired: false };
    const expired = isTokenExpired(token.expiresAt, this.clock.now(), this.publishers[platform].expiryBufferMs);
    return token.expiresAt ? { connected: true, expired, expiresAt: token.expiresAt } : { connected: true, expired };
  }

  private toCredential(platform: Platform, token: StoredToken): PlatformCredential {
    return token.accountId
      ? { platform, accessToken: token.accessToken, accountId: token.accountId }
      : { platform, accessToken: token.accessToken };
  }
}
