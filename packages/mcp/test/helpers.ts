import { readFileSync } from 'node:fs';
import type { CatalogIndex, UpstreamClient, UpstreamRequest, UpstreamResponse } from '@openapi-scout/core';
import { buildCatalogIndex } from '@openapi-scout/openapi';
import { BUNDLED_DOCUMENT } from '../src/config.js';

export const MEDIA_SERVER_YAML = readFileSync(BUNDLED_DOCUMENT, 'utf-8');

export function mediaServerIndex(): CatalogIndex {
  return buildCatalogIndex(MEDIA_SERVER_YAML);
}

export interface RecordingClient extends UpstreamClient {
  requests: UpstreamRequest[];
}

export function recordingClient(
  respond: (request: UpstreamRequest) => UpstreamResponse = () => ({ status: 200, data: null }),
): RecordingClient {
  const requests: UpstreamRequest[] = [];
  return {
    requests,
    async send(request) {
      requests.push(request);
      return respond(request);
    },
  };
}

/** Text of the first content item of a tool result or resource read */
export function firstText(result: unknown, key: 'content' | 'contents' = 'content'): string {
  if (typeof result === 'object' && result !== null && key in result) {
    const items: unknown = Reflect.get(result, key);
    if (Array.isArray(items)) {
      const first: unknown = items[0];
      if (typeof first === 'object' && first !== null && 'text' in first && typeof first.text === 'string') {
        return first.text;
      }
    }
  }
  throw new Error('result has no text content');
}

export function isErrorResult(result: unknown): boolean {
  return typeof result === 'object' && result !== null && 'isError' in result && result.isError === true;
}
