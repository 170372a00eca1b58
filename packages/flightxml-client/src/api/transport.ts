import type { Transport } from '../types/client';
import type { WireParams } from '../types/api';

/**
 * Encode wire params as an application/x-www-form-urlencoded body.
 * List values repeat the key once per element.
 */
export function encodeForm(params: WireParams): string {
  const body = new URLSearchParams();

  for (const [key, value] of Object.entries(params)) {
    if (Array.isArray(value)) {
      for (const item of value) {
        body.append(key, item);
      }
    } else {
      body.append(key, String(value));
    }
  }

  return body.toString();
}

/**
 * HTTP Basic `Authorization` header value
 */
export function basicAuthorization(username: string, apiKey: string): string {
  return `Basic ${Buffer.from(`${username}:${apiKey}`).toString('base64')}`;
}

/**
 * Default transport over the global fetch.
 *
 * Rejects with the fetch error (a TypeError for network failures, a
 * TimeoutError DOMException when `timeoutMs` elapses); HTTP error statuses
 * resolve normally.
 */
export function createFetchTransport(timeoutMs: number): Transport {
  return async ({ url, headers, body }) => {
    const response = await fetch(url, {
      method: 'POST',
      headers,
      body,
      signal: AbortSignal.timeout(timeoutMs),
    });

    return {
      status: response.status,
      body: await response.text(),
    };
  };
}
