/**
 * HTTPS transport shared by the platform clients.
 *
 * Never rejects: network errors and timeouts come back as `status: 0`
 * with `error` set, so callers branch on `ok` alone.
 */

import https from 'https';
import type { IncomingHttpHeaders } from 'http';

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface HttpRequestOptions {
  method: 'GET' | 'POST' | 'PUT' | 'DELETE';
  url: string;
  headers?: Record<string, string>;
  body?: string | Buffer;
  timeoutMs?: number;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  headers: Record<string, string>;
  body: Buffer;
  error?: string;
}

export interface JsonResponse {
  ok: boolean;
  status: number;
  headers: Record<string, string>;
  data?: unknown;
  error?: string;
}

function flattenHeaders(raw: IncomingHttpHeaders): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === 'string') headers[name] = value;
    else if (Array.isArray(value)) headers[name] = value.join(', ');
  }
  return headers;
}

export function httpRequest(options: HttpRequestOptions): Promise<HttpResponse> {
  const headers: Record<string, string> = { ...options.headers };
  if (options.body !== undefined) {
    headers['Content-Length'] = Buffer.byteLength(options.body).toString();
  }

  return new Promise((resolve) => {
    let url: URL;
    try {
      url = new URL(options.url);
    } catch {
      resolve({ ok: false, status: 0, headers: {}, body: Buffer.alloc(0), error: `Invalid URL: ${options.url}` });
      return;
    }

    const req = https.request(
      url,
      { method: options.method, headers, timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('end', () => {
          const status = res.statusCode ?? 500;
          resolve({
            ok: status >= 200 && status < 300,
            status,
            headers: flattenHeaders(res.headers),
            body: Buffer.concat(chunks),
          });
        });
        res.on('error', (err) => resolve({ ok: false, status: 0, headers: {}, body: Buffer.alloc(0), error: err.message }));
      },
    );

    req.on('timeout', () => {
      req.destroy(new Error(`Request timed out after ${options.timeoutMs ?? DEFAULT_TIMEOUT_MS}ms`));
    });
    req.on('error', (err) => resolve({ ok: false, status: 0, headers: {}, body: Buffer.alloc(0), error: err.message }));
    if (options.body !== undefined) req.write(options.body);
    req.end();
  });
}

/** Message from a provider error body: `message`, `error.message` or the whole payload. */
export function describeError(payload: unknown, fallback: string): string {
  if (payload && typeof payload === 'object') {
    if ('message' in payload && typeof payload.message === 'string') return payload.message;
    if ('error' in payload) {
      const inner = payload.error;
      if (inner && typeof inner === 'object' && 'message' in inner && typeof inner.message === 'string') {
        return inner.message;
      }
    }
    return JSON.stringify(payload);
  }
  return fallback;
}

/**
 * Sends a request and parses the body as JSON. Non-2xx responses keep the
 * parsed payload in `data` and a readable message in `error`.
 */
export async function requestJson(options: HttpRequestOptions): Promise<JsonResponse> {
  const response = await httpRequest(options);
  if (response.status === 0) {
    return { ok: false, status: 0, headers: response.headers, error: response.error ?? 'Network error' };
  }

  const text = response.body.toString('utf8');
  let data: unknown = {};
  if (text) {
    try {
      data = JSON.parse(text);
    } catch {
      data = { raw: text };
    }
  }

  if (response.ok) {
    return { ok: true, status: response.status, headers: response.headers, data };
  }
  return {
    ok: false,
    status: response.status,
    headers: response.headers,
    data,
    error: describeError(data, text || `HTTP ${response.status}`),
  };
}

/** Reads a string property from an unknown JSON payload. */
export function stringField(payload: unknown, key: string): string | undefined {
  if (!payload || typeof payload !== 'object' || !(key in payload)) return undefined;
  const value: unknown = Object.getOwnPropertyDescriptor(payload, key)?.value;
  return typeof value === 'string' ? value : undefined;
}

/** Reads a numeric property from an unknown JSON payload. */
export function numberField(payload: unknown, key: string): number | undefined {
  if (!payload || typeof payload !== 'object' || !(key in payload)) return undefined;
  const value: unknown = Object.getOwnPropertyDescriptor(payload, key)?.value;
  return typeof value === 'number' ? value : undefined;
}

export function objectField(payload: unknown, key: string): unknown {
  if (!payload || typeof payload !== 'object' || !(key in payload)) return undefined;
  return Object.getOwnPropertyDescriptor(payload, key)?.value;
}

/** Provider error as stored on a failed row: the JSON payload when there is one. */
export function errorPayload(response: JsonResponse, fallback: string): string {
  if (response.data !== undefined) return JSON.stringify(response.data);
  return response.error ?? fallback;
}
