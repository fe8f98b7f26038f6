/**
 * Common HTTP client utilities
 * Outbound calls never throw: failures come back as { ok: false, error }
 */

import { getErrorMessage } from './errors.js';
import { parseJson } from './safe-json.js';

export const TRUSTED_HOSTS = ['api.line.me', 'api-data.line.me'] as const;

const DEFAULT_TIMEOUT_MS = 5000;

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  timeout?: number;
}

export interface HttpResponse<T = unknown> {
  data: T | null;
  ok: boolean;
  status?: number;
  error?: string;
}

/**
 * Only https to the chat platform (and http to localhost) is allowed
 */
export function validateUrl(url: string): string {
  try {
    const parsed = new URL(url);

    if (parsed.protocol === 'http:' && parsed.hostname === 'localhost') {
      return url;
    }

    if (parsed.protocol !== 'https:') {
      throw new Error('Only HTTPS URLs are allowed');
    }

    if (!TRUSTED_HOSTS.some((host) => host === parsed.hostname)) {
      throw new Error(`Untrusted host: ${parsed.hostname}`);
    }

    return url;
  } catch (error) {
    throw new Error(`Invalid URL: ${getErrorMessage(error)}`);
  }
}

/**
 * Centralized HTTP GET request with validation and error handling
 */
export async function httpGet(
  url: string,
  options: HttpRequestOptions = {}
): Promise<HttpResponse> {
  return request('GET', url, undefined, options);
}

/**
 * JSON POST with the same guarantees as httpGet
 */
export async function httpPostJson(
  url: string,
  body: unknown,
  options: HttpRequestOptions = {}
): Promise<HttpResponse> {
  return request('POST', url, JSON.stringify(body), {
    ...options,
    headers: { 'Content-Type': 'application/json', ...options.headers },
  });
}

async function request(
  method: 'GET' | 'POST',
  url: string,
  body: string | undefined,
  options: HttpRequestOptions
): Promise<HttpResponse> {
  try {
    validateUrl(url);

    // Use dynamic import for node-fetch
    const { default: fetch } = await import('node-fetch');

    const response = await fetch(url, {
      method,
      headers: options.headers,
      body,
      signal: AbortSignal.timeout(options.timeout ?? DEFAULT_TIMEOUT_MS),
    });

    if (!response.ok) {
      return {
        data: null,
        ok: false,
        status: response.status,
        error: `HTTP ${response.status}: ${response.statusText}`,
      };
    }

    const text = await response.text();
    if (!text) {
      return { data: null, ok: true, status: response.status };
    }

    const parsed = parseJson(text);
    if (!parsed.ok) {
      return {
        data: null,
        ok: false,
        status: response.status,
        error: `Invalid JSON response: ${parsed.error}`,
      };
    }

    return { data: parsed.value, ok: true, status: response.status };
  } catch (error) {
    return {
      data: null,
      ok: false,
      error: getErrorMessage(error),
    };
  }
}
