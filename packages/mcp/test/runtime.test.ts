import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';
import { createCatalogRuntime } from '../src/runtime.js';
import { MEDIA_SERVER_YAML } from './helpers.js';

const DOCUMENT_URL = 'http://docs.test/media-server.yaml';

interface UpstreamCall {
  url: string;
  headers: HeadersInit | undefined;
}

function scriptedFetch() {
  const state: { documentOnline: boolean; upstreamCalls: UpstreamCall[] } = { documentOnline: true, upstreamCalls: [] };
  const fetchFn: typeof fetch = async (input, init) => {
    const url = String(input);
    if (url === DOCUMENT_URL) {
      if (!state.documentOnline) throw new Error('offline');
      return new Response(MEDIA_SERVER_YAML, { status: 200 });
    }
    state.upstreamCalls.push({ url, headers: init?.headers });
    return new Response('{"version":"4.0.0","_links":{"self":"/"}}', { status: 200 });
  };
  return { state, fetchFn };
}

function runtimeConfig() {
  return loadConfig({
    env: {},
    overrides: {
      openapiSource: DOCUMENT_URL,
      baseUrl: 'http://media.test:8989',
      apiKey: 'test-secret',
      logLevel: 'error',
    },
  });
}

describe('createCatalogRuntime', () => {
  it('builds the catalog and calls the configured upstream', async () => {
    const { state, fetchFn } = scriptedFetch();
    const runtime = await createCatalogRuntime(runtimeConfig(), { fetchFn });

    expect(runtime.store.current().stats.operationCount).toBe(24);

    const outcome = await runtime.engine.execute({
      kind: 'dispatch',
      invocation: { toolName: 'get_system_status', arguments: {} },
    });

    expect(outcome).toEqual({
      kind: 'dispatch',
      result: { toolName: 'get_system_status', status: 200, data: { version: '4.0.0' } },
    });
    expect(state.upstreamCalls).toEqual([
      {
        url: 'http://media.test:8989/api/v3/system/status',
        headers: { 'Accept': 'application/json', 'X-Api-Key': 'test-secret' },
      },
    ]);
  });

  it('swaps in a rebuilt catalog on reload', async () => {
    const { fetchFn } = scriptedFetch();
    const runtime = await createCatalogRuntime(runtimeConfig(), { fetchFn });
    const first = runtime.store.current();

    const next = await runtime.reload();

    expect(next).not.toBe(first);
    expect(runtime.store.current()).toBe(next);
    expect(runtime.store.getGeneration()).toBe(2);
  });

  it('keeps the current catalog when a reload fails', async () => {
    const { state, fetchFn } = scriptedFetch();
    const runtime = await createCatalogRuntime(runtimeConfig(), { fetchFn });
    const first = runtime.store.current();

    state.documentOnline = false;
    await expect(runtime.reload()).rejects.toThrow(
      'Could not fetch OpenAPI document from http://docs.test/media-server.yaml: offline',
    );

    expect(runtime.store.current()).toBe(first);
    expect(runtime.store.getGeneration()).toBe(1);
  });

  it('fails to start when the document cannot be loaded', async () => {
    const config = loadConfig({ env: {}, overrides: { openapiSource: '/nonexistent/openapi.yaml', logLevel: 'error' } });
    await expect(createCatalogRuntime(config)).rejects.toThrow('Could not read OpenAPI document /nonexistent/openapi.yaml');
  });
});
