import type { UpstreamClient, UpstreamRequest, UpstreamResponse } from '@openapi-scout/core';

export const DEFAULT_API_KEY_HEADER = 'X-Api-Key';

export interface FetchClientOptions {
  /** Upstream origin plus any base path, e.g. "http://localhost:8989" */
  baseUrl: string;
  apiKey?: string;
  apiKeyHeader?: string;
  /** Custom fetch function (for testing or proxying) */
  fetchFn?: typeof fetch;
}

export function buildUrl(baseUrl: string, request: Pick<UpstreamRequest, 'path' | 'query'>): string {
  let url = `${baseUrl.replace(/\/+$/, '')}${request.path.startsWith('/') ? '' : '/'}${request.path}`;

  const qs = new URLSearchParams();
  for (const [key, value] of Object.entries(request.query)) {
    if (Array.isArray(value)) {
      for (const item of value) qs.append(key, item);
    } else {
      qs.append(key, value);
    }
  }
  const query = qs.toString();
  if (query) url += `?${query}`;
  return url;
}

function parseBody(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * UpstreamClient over fetch. Any status comes back as a response; only
 * transport failures reject, and the dispatcher decides what a status means.
 */
export function createFetchClient(options: FetchClientOptions): UpstreamClient {
  const fetchFn = options.fetchFn ?? globalThis.fetch;
  const apiKeyHeader = options.apiKeyHeader ?? DEFAULT_API_KEY_HEADER;

  return {
    async send(request, { signal }): Promise<UpstreamResponse> {
      const headers: Record<string, string> = {
        'Accept': 'application/json',
        ...request.headers,
      };
      if (options.apiKey) headers[apiKeyHeader] = options.apiKey;

      const init: RequestInit = { method: request.method, headers, signal };
      if (request.body !== undefined) {
        headers['Content-Type'] = 'application/json';
        init.body = JSON.stringify(request.body);
      }

      const response = await fetchFn(buildUrl(options.baseUrl, request), init);
      if (response.status === 204) return { status: 204, data: null };

      const text = await response.text();
      return { status: response.status, data: parseBody(text) };
    },
  };
}
