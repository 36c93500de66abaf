import { vi } from 'vitest';
import type { FetchLike } from '../services/oauth/oauth-client.service';

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: string;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function headerRecord(headers: RequestInit['headers']): Record<string, string> {
  return Object.fromEntries(new Headers(headers).entries());
}

/**
 * In-process fetch stand-in that answers from a queue and records requests.
 */
export function createFakeFetch(...responses: Response[]) {
  const requests: RecordedRequest[] = [];
  const queue = [...responses];

  const fetch = vi.fn<FetchLike>(async (url, init) => {
    requests.push({
      url,
      method: init.method ?? 'GET',
      headers: headerRecord(init.headers),
      body: typeof init.body === 'string' ? init.body : '',
    });
    const next = queue.shift();
    if (!next) throw new Error(`Unexpected request to ${url}`);
    return next;
  });

  return { fetch, requests };
}
