/**
 * HTTP Client Utilities
 *
 * Thin wrappers over global fetch that:
 * - Apply a request timeout
 * - Map every failure onto a TransportError kind
 * - Return decoded JSON as `unknown` for the parsers to narrow
 */

import { TransportError } from './errors.js';

/**
 * Options for HTTP requests
 */
export interface HttpRequestOptions extends Omit<RequestInit, 'signal'> {
  /** Request timeout in milliseconds */
  timeout?: number;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * Perform the request and classify transport-level failures
 */
async function request(url: string, options: HttpRequestOptions): Promise<Response> {
  const { timeout, ...fetchOptions } = options;

  let response: Response;
  try {
    response = await fetch(url, {
      ...fetchOptions,
      signal: timeout ? AbortSignal.timeout(timeout) : undefined,
    });
  } catch (error) {
    if (isAbortError(error)) {
      throw new TransportError('timeout', `request timed out after ${timeout ?? 0}ms`, {
        url,
        cause: error,
      });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new TransportError('unreachable', reason, { url, cause: error });
  }

  if (response.status === 401) {
    throw new TransportError('unauthorized', 'API key rejected (401 Unauthorized)', {
      url,
      upstreamStatus: 401,
    });
  }

  if (!response.ok) {
    throw new TransportError(
      'unreachable',
      `request failed: ${response.status} ${response.statusText}`,
      { url, upstreamStatus: response.status }
    );
  }

  return response;
}

/**
 * Fetch JSON data from a URL
 *
 * @example
 * const data = await fetchJson('http://emby.local:8096/Sessions', {
 *   headers: { 'X-Emby-Token': apiKey },
 *   timeout: 10000,
 * });
 */
export async function fetchJson(url: string, options: HttpRequestOptions = {}): Promise<unknown> {
  const response = await request(url, options);
  const body = await response.text();
  if (body.trim() === '') return null;

  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch (error) {
    throw new TransportError('malformed', 'response was not valid JSON', { url, cause: error });
  }
}

/**
 * POST without expecting a response body (playback commands)
 */
export async function postEmpty(url: string, options: HttpRequestOptions = {}): Promise<void> {
  const response = await request(url, { ...options, method: 'POST' });
  // Drain the body so the connection can be reused
  await response.arrayBuffer();
}

/**
 * Helper to create Emby-specific headers
 */
export function embyHeaders(apiKey?: string): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: 'application/json',
  };

  if (apiKey) {
    headers['X-Emby-Token'] = apiKey;
  }

  return headers;
}
