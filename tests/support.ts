import type { Logger, Platform } from '../src/core/types.js';
import type { StoredToken } from '../src/core/storage/token-store.js';
import type { ConnectionStatus, CredentialProvider, CredentialResult } from '../src/services/social/credentials.js';
import type {
  PlatformCredential,
  PlatformPublisher,
  PublishInput,
  PublishOutcome,
  RefreshOutcome,
} from '../src/services/social/types.js';

export const logger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};

/** Monday 5 January 2026, 10:00 local time. */
export function mondayMorning(): Date {
  return new Date(2026, 0, 5, 10, 0, 0);
}

export class FakePublisher implements PlatformPublisher {
  readonly expiryBufferMs = 0;
  readonly calls: Array<{ credential: PlatformCredential; input: PublishInput }> = [];
  /** Consumed one per publish; an empty queue means success. */
  readonly outcomes: PublishOutcome[] = [];
  throwOnPublish: string | null = null;
  /** Holds each publish open this long, so other work can queue behind it. */
  delayMs = 0;

  constructor(readonly platform: Platform) {}

  isUsable(_token: StoredToken): boolean {
    return true;
  }

  canRefresh(_token: StoredToken): boolean {
    return false;
  }

  async refresh(_token: StoredToken): Promise<RefreshOutcome> {
    return { ok: false, error: 'refresh not supported' };
  }

  async publish(credential: PlatformCredential, input: PublishInput): Promise<PublishOutcome> {
    this.calls.push({ credential, input });
    if (this.delayMs > 0) await new Promise(resolve => setTimeout(resolve, this.delayMs));
    if (this.throwOnPublish) throw new Error(this.throwOnPublish);
    const next = this.outcomes.shift();
    if (next) return next;
    const postId = `${this.platform}-post-${this.calls.length}`;
    return { success: true, postId, postUrl: `https://example.test/${postId}` };
  }
}

export function fakePublishers(): { linkedin: FakePublisher; threads: FakePublisher } {
  return { linkedin: new FakePublisher('linkedin'), threads: new FakePublisher('threads') };
}

export class FakeCredentials implements CredentialProvider {
  readonly lookups: Platform[] = [];
  readonly unavailable = new Map<Platform, string>();

  async ensureValidToken(platform: Platform): Promise<CredentialResult> {
    this.lookups.push(platform);
    const error = this.unavailable.get(platform);
    if (error) return { ok: false, error };
    return { ok: true, credential: { platform, accessToken: 'test-token', accountId: `${platform}-account` } };
  }

  status(platform: Platform): ConnectionStatus {
    return this.unavailable.has(platform) ? { connected: false, expired: false } : { connected: true, expired: false };
  }
}
