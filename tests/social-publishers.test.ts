import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { HttpRequestOptions, HttpResponse, JsonResponse } from '../src/services/social/http.js';
import { LINKEDIN_MAX_TEXT_LENGTH, LinkedInPublisher } from '../src/services/social/linkedin.js';
import { ThreadsPublisher, truncateForThreads } from '../src/services/social/threads.js';
import { logger, mondayMorning } from './support.js';

const http = vi.hoisted(() => ({
  requestJson: vi.fn<(options: HttpRequestOptions) => Promise<JsonResponse>>(),
  httpRequest: vi.fn<(options: HttpRequestOptions) => Promise<HttpResponse>>(),
}));

vi.mock('../src/services/social/http.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/services/social/http.js')>();
  return { ...actual, requestJson: http.requestJson, httpRequest: http.httpRequest };
});

function json(status: number, data: unknown, headers: Record<string, string> = {}): JsonResponse {
  const ok = status >= 200 && status < 300;
  return ok ? { ok, status, headers, data } : { ok, status, headers, data, error: `HTTP ${status}` };
}

function requestAt(index: number): HttpRequestOptions {
  const call = http.requestJson.mock.calls[index];
  if (!call) throw new Error(`No request #${index}`);
  return call[0];
}

function bodyOf(options: HttpRequestOptions): unknown {
  return JSON.parse(String(options.body));
}

const credential = { platform: 'linkedin' as const, accessToken: 'test-token', accountId: 'urn:li:person:abc' };

describe('LinkedInPublisher', () => {
  beforeEach(() => {
    http.requestJson.mockReset();
    http.httpRequest.mockReset();
  });

  it('posts text to /rest/posts and builds the permalink from x-restli-id', async () => {
    http.requestJson.mockResolvedValueOnce(json(201, {}, { 'x-restli-id': 'urn:li:share:123' }));
    const publisher = new LinkedInPublisher({}, logger);

    const outcome = await publisher.publish(credential, { text: 'x'.repeat(LINKEDIN_MAX_TEXT_LENGTH + 50) });

    expect(outcome).toEqual({
      success: true,
      postId: 'urn:li:share:123',
      postUrl: 'https://www.linkedin.com/feed/update/urn:li:share:123',
    });
    const request = requestAt(0);
    expect(request.url).toBe('https://api.linkedin.com/rest/posts');
    expect(request.headers).toMatchObject({ Authorization: 'Bearer test-token', 'LinkedIn-Version': '202601' });
    expect(bodyOf(request)).toMatchObject({
      author: 'urn:li:person:abc',
      commentary: 'x'.repeat(LINKEDIN_MAX_TEXT_LENGTH),
      visibility: 'PUBLIC',
      distribution: { feedDistribution: 'MAIN_FEED' },
      lifecycleState: 'PUBLISHED',
    });
  });

  it('returns the provider payload when the post is rejected', async () => {
    http.requestJson.mockResolvedValueOnce(json(422, { message: 'Duplicate post', status: 422 }));
    const publisher = new LinkedInPublisher({}, logger);

    await expect(publisher.publish(credential, { text: 'Hello' })).resolves.toEqual({
      success: false,
      error: '{"message":"Duplicate post","status":422}',
    });
  });

  it('refuses to post without a member URN', async () => {
    const publisher = new LinkedInPublisher({}, logger);
    await expect(publisher.publish({ platform: 'linkedin', accessToken: 'test-token' }, { text: 'Hello' })).resolves.toEqual({
      success: false,
      error: 'LinkedIn not connected',
    });
    expect(http.requestJson).not.toHaveBeenCalled();
  });

  it('uploads the image and attaches its URN', async () => {
    http.httpRequest
      .mockResolvedValueOnce({ ok: true, status: 200, headers: { 'content-type': 'image/png' }, body: Buffer.from('png-bytes') })
      .mockResolvedValueOnce({ ok: true, status: 201, headers: {}, body: Buffer.alloc(0) });
    http.requestJson
      .mockResolvedValueOnce(json(200, { value: { uploadUrl: 'https://upload.test/1', image: 'urn:li:image:9' } }))
      .mockResolvedValueOnce(json(201, {}, { 'x-restli-id': 'urn:li:share:456' }));
    const publisher = new LinkedInPublisher({}, logger);

    const outcome = await publisher.publish(credential, { text: 'With art', imageUrl: 'https://cdn.test/a.png', title: 'Cover' });

    expect(outcome).toMatchObject({ success: true, postId: 'urn:li:share:456' });
    expect(requestAt(0).url).toBe('https://api.linkedin.com/rest/images?action=initializeUpload');
    const upload = http.httpRequest.mock.calls[1]?.[0];
    expect(upload).toMatchObject({ method: 'PUT', url: 'https://upload.test/1' });
    expect(upload?.headers).toMatchObject({ 'Content-Type': 'image/png' });
    expect(bodyOf(requestAt(1))).toMatchObject({ content: { media: { id: 'urn:li:image:9', title: 'Cover' } } });
  });

  it('falls back to a text post when the image cannot be fetched', async () => {
    http.httpRequest.mockResolvedValueOnce({ ok: false, status: 404, headers: {}, body: Buffer.alloc(0) });
    http.requestJson.mockResolvedValueOnce(json(201, {}, { 'x-restli-id': 'urn:li:share:789' }));
    const publisher = new LinkedInPublisher({}, logger);

    const outcome = await publisher.publish(credential, { text: 'Text only', imageUrl: 'https://cdn.test/missing.png' });

    expect(outcome).toMatchObject({ success: true, postId: 'urn:li:share:789' });
    expect(http.requestJson).toHaveBeenCalledTimes(1);
    expect(bodyOf(requestAt(0))).not.toHaveProperty('content');
  });

  it('refreshes with the refresh_token grant when the app is configured', async () => {
    const token = { accessToken: 'old', refreshToken: 'test-refresh', accountId: 'urn:li:person:abc' };
    expect(new LinkedInPublisher({}, logger).canRefresh(token)).toBe(false);

    http.requestJson.mockResolvedValueOnce(json(200, { access_token: 'fresh', expires_in: 3600 }));
    const publisher = new LinkedInPublisher({ clientId: 'test-client', clientSecret: 'test-secret' }, logger, mondayMorning);
    expect(publisher.canRefresh(token)).toBe(true);

    await expect(publisher.refresh(token)).resolves.toEqual({
      ok: true,
      token: {
        accessToken: 'fresh',
        refreshToken: 'test-refresh',
        accountId: 'urn:li:person:abc',
        expiresAt: new Date(mondayMorning().getTime() + 3600 * 1000).toISOString(),
      },
    });
    const body = new URLSearchParams(String(requestAt(0).body));
    expect(body.get('grant_type')).toBe('refresh_token');
    expect(body.get('refresh_token')).toBe('test-refresh');
  });
});

describe('ThreadsPublisher', () => {
  const threadsCredential = { platform: 'threads' as const, accessToken: 'test-token' };

  beforeEach(() => {
    http.requestJson.mockReset();
    http.httpRequest.mockReset();
  });

  it('truncates long text to 500 characters', () => {
    expect(truncateForThreads('a'.repeat(500))).toBe('a'.repeat(500));
    expect(truncateForThreads('a'.repeat(501))).toBe(`${'a'.repeat(497)}...`);
  });

  it('creates a container, waits for it, publishes and looks up the permalink', async () => {
    http.requestJson
      .mockResolvedValueOnce(json(200, { id: 'container-1' }))
      .mockResolvedValueOnce(json(200, { status: 'FINISHED' }))
      .mockResolvedValueOnce(json(200, { id: 'thread-1' }))
      .mockResolvedValueOnce(json(200, { permalink: 'https://www.threads.net/@pod/post/abc' }));
    const publisher = new ThreadsPublisher(logger, { intervalMs: 0 });

    const outcome = await publisher.publish(threadsCredential, { text: 'b'.repeat(600) });

    expect(outcome).toEqual({ success: true, postId: 'thread-1', postUrl: 'https://www.threads.net/@pod/post/abc' });
    const create = new URL(requestAt(0).url);
    expect(create.pathname).toBe('/me/threads');
    expect(create.searchParams.get('media_type')).toBe('TEXT');
    expect(create.searchParams.get('text')).toBe(`${'b'.repeat(497)}...`);
    expect(new URL(requestAt(2).url).searchParams.get('creation_id')).toBe('container-1');
  });

  it('fails when the container reports an error', async () => {
    http.requestJson
      .mockResolvedValueOnce(json(200, { id: 'container-2' }))
      .mockResolvedValueOnce(json(200, { status: 'ERROR', error_message: 'Unsupported image' }));
    const publisher = new ThreadsPublisher(logger, { intervalMs: 0 });

    await expect(publisher.publish(threadsCredential, { text: 'Hi', imageUrl: 'https://cdn.test/x.gif' })).resolves.toEqual({
      success: false,
      error: 'Unsupported image',
    });
    expect(new URL(requestAt(0).url).searchParams.get('image_url')).toBe('https://cdn.test/x.gif');
    expect(http.requestJson).toHaveBeenCalledTimes(2);
  });

  it('publishes anyway after the last poll', async () => {
    http.requestJson
      .mockResolvedValueOnce(json(200, { id: 'container-3' }))
      .mockResolvedValueOnce(json(200, { status: 'IN_PROGRESS' }))
      .mockResolvedValueOnce(json(200, { status: 'IN_PROGRESS' }))
      .mockResolvedValueOnce(json(200, { id: 'thread-3' }))
      .mockResolvedValueOnce(json(500, { error: { message: 'lookup down' } }));
    const publisher = new ThreadsPublisher(logger, { maxAttempts: 2, intervalMs: 0 });

    await expect(publisher.publish(threadsCredential, { text: 'Hi' })).resolves.toEqual({ success: true, postId: 'thread-3' });
    expect(http.requestJson).toHaveBeenCalledTimes(5);
  });

  it('keeps the provider payload when the container is rejected', async () => {
    http.requestJson.mockResolvedValueOnce(json(400, { error: { message: 'Invalid token' } }));
    const publisher = new ThreadsPublisher(logger, { intervalMs: 0 });

    await expect(publisher.publish(threadsCredential, { text: 'Hi' })).resolves.toEqual({
      success: false,
      error: '{"error":{"message":"Invalid token"}}',
    });
  });

  it('extends the token with th_refresh_token', async () => {
    http.requestJson.mockResolvedValueOnce(json(200, { access_token: 'extended', expires_in: 5_184_000 }));
    const publisher = new ThreadsPublisher(logger, {}, mondayMorning);

    await expect(publisher.refresh({ accessToken: 'test-token', accountId: 'th-user' })).resolves.toEqual({
      ok: true,
      token: {
        accessToken: 'extended',
        accountId: 'th-user',
        expiresAt: new Date(mondayMorning().getTime() + 5_184_000 * 1000).toISOString(),
      },
    });
    const url = new URL(requestAt(0).url);
    expect(url.pathname).toBe('/refresh_access_token');
    expect(url.searchParams.get('grant_type')).toBe('th_refresh_token');
  });
});
