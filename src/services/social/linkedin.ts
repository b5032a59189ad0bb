/**
 * LinkedIn Publishing Client
 *
 * Posts member updates through the versioned REST API (`/rest/posts`).
 * Image posts upload the picture first (`/rest/images?action=initializeUpload`
 * then a binary PUT) and attach the returned image URN.
 *
 * Token refresh uses the OAuth `refresh_token` grant and needs
 * LINKEDIN_CLIENT_ID / LINKEDIN_CLIENT_SECRET.
 * Scopes needed: w_member_social, openid, profile
 */

import type { Logger } from '../../core/types.js';
import type { StoredToken } from '../../core/storage/token-store.js';
import { errorPayload, httpRequest, numberField, objectField, requestJson, stringField } from './http.js';
import type { PlatformCredential, PlatformPublisher, PublishInput, PublishOutcome, RefreshOutcome } from './types.js';

export const LINKEDIN_API_VERSION = '202601';
export const LINKEDIN_MAX_TEXT_LENGTH = 3000;
export const LINKEDIN_EXPIRY_BUFFER_MS = 5 * 60_000;

const API_BASE = 'https://api.linkedin.com';
const TOKEN_URL = 'https://www.linkedin.com/oauth/v2/accessToken';

export interface LinkedInAppConfig {
  clientId?: string;
  clientSecret?: string;
}

function apiHeaders(accessToken: string): Record<string, string> {
  return {
    Authorization: `Bearer ${accessToken}`,
    'Content-Type': 'application/json',
    'LinkedIn-Version': LINKEDIN_API_VERSION,
    'X-Restli-Protocol-Version': '2.0.0',
  };
}

export function postUrlFor(postUrn: string): string | undefined {
  return postUrn ? `https://www.linkedin.com/feed/update/${postUrn}` : undefined;
}

export class LinkedInPublisher implements PlatformPublisher {
  readonly platform = 'linkedin' as const;
  readonly expiryBufferMs = LINKEDIN_EXPIRY_BUFFER_MS;

  constructor(
    private app: LinkedInAppConfig,
    private logger?: Logger,
    private now: () => Date = () => new Date(),
  ) {}

  isUsable(token: StoredToken): boolean {
    return Boolean(token.accessToken && token.accountId);
  }

  canRefresh(token: StoredToken): boolean {
    return Boolean(token.refreshToken && this.app.clientId && this.app.clientSecret);
  }

  async refresh(token: StoredToken): Promise<RefreshOutcome> {
    if (!token.refreshToken || !this.app.clientId || !this.app.clientSecret) {
      return { ok: false, error: 'LinkedIn refresh is not configured' };
    }

    const body = new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: token.refreshToken,
      client_id: this.app.clientId,
      client_secret: this.app.clientSecret,
    }).toString();

    const result = await requestJson({
      method: 'POST',
      url: TOKEN_URL,
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body,
    });
    const accessToken = stringField(result.data, 'access_token');
    if (!result.ok || !accessToken) {
      this.logger?.warn('LinkedIn token refresh failed', { status: result.status, error: result.error });
      return { ok: false, error: result.error ?? 'No access token in refresh response' };
    }

    const expiresIn = numberField(result.data, 'expires_in');
    const refreshed: StoredToken = {
      ...token,
      accessToken,
      refreshToken: stringField(result.data, 'refresh_token') ?? token.refreshToken,
    };
    if (expiresIn !== undefined) {
      refreshed.expiresAt = new Date(this.now().getTime() + expiresIn * 1000).toISOString();
    }
    this.logger?.info('LinkedIn token refreshed');
    return { ok: true, token: refreshed };
  }

  async publish(credential: PlatformCredential, input: PublishInput): Promise<PublishOutcome> {
    if (!credential.accountId) {
      return { success: false, error: 'LinkedIn not connected' };
    }

    const payload: Record<string, unknown> = {
      author: credential.accountId,
      commentary: input.text.slice(0, LINKEDIN_MAX_TEXT_LENGTH),
      visibility: 'PUBLIC',
      distribution: {
        feedDistribution: 'MAIN_FEED',
        targetEntities: [],
        thirdPartyDistributionChannels: [],
      },
      lifecycleState: 'PUBLISHED',
      isReshareDisabledByAuthor: false,
    };

    if (input.imageUrl) {
      const imageUrn = await this.uploadImage(credential.accessToken, credential.accountId, input.imageUrl);
      if (imageUrn) {
        payload.content = { media: { id: imageUrn, ...(input.title ? { title: input.title } : {}) } };
      } else {
        this.logger?.warn('LinkedIn image upload failed; posting text only');
      }
    }

    const result = await requestJson({
      method: 'POST',
      url: `${API_BASE}/rest/posts`,
      headers: apiHeaders(credential.accessToken),
      body: JSON.stringify(payload),
    });

    if (!result.ok) {
      this.logger?.error('LinkedIn post failed', { status: result.status, error: result.error });
      return { success: false, error: errorPayload(result, 'LinkedIn post failed') };
    }

    // The post URN comes back in x-restli-id
    const postId = result.headers['x-restli-id'] ?? stringField(result.data, 'id') ?? '';
    this.logger?.info('LinkedIn post published', { id: postId });
    const postUrl = postUrlFor(postId);
    return postUrl ? { success: true, postId, postUrl } : { success: true, postId };
  }

  /** Returns the image URN, or null when any step fails. */
  private async uploadImage(accessToken: string, ownerUrn: string, imageUrl: string): Promise<string | null> {
    const image = await httpRequest({ method: 'GET', url: imageUrl });
    if (!image.ok) {
      this.logger?.warn('Image download failed', { imageUrl, status: image.status, error: image.error });
      return null;
    }

    const init = await requestJson({
      method: 'POST',
      url: `${API_BASE}/rest/images?action=initializeUpload`,
      headers: apiHeaders(accessToken),
      body: JSON.stringify({ initializeUploadRequest: { owner: ownerUrn } }),
    });
    const value = objectField(init.data, 'value');
    const uploadUrl = stringField(value, 'uploadUrl');
    const imageUrn = stringField(value, 'image');
    if (!init.ok || !uploadUrl || !imageUrn) {
      this.logger?.warn('LinkedIn image upload init failed', { status: init.status, error: init.error });
      return null;
    }

    const upload = await httpRequest({
      method: 'PUT',
      url: uploadUrl,
      headers: {
        Authorization: `Bearer ${accessToken}`,
        'Content-Type': image.headers['content-type'] ?? 'image/jpeg',
      },
      body: image.body,
      timeoutMs: 60_000,
    });
    if (!upload.ok) {
      this.logger?.warn('LinkedIn image upload failed', { status: upload.status, error: upload.error });
      return null;
    }
    return imageUrn;
  }
}
