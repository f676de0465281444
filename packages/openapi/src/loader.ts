import { readFile } from 'node:fs/promises';
import { SchemaError, createLogger, errorMessage } from '@openapi-scout/core';
import { parseDocumentText } from './converter.js';

const log = createLogger('loader');

export const DEFAULT_LOAD_TIMEOUT_MS = 10_000;

export interface LoadOptions {
  fetchFn?: typeof fetch;
  timeoutMs?: number;
}

export function isUrl(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

async function fetchText(url: string, options: LoadOptions): Promise<string> {
  const fetchFn = options.fetchFn ?? globalThis.fetch;
  let res: Response;
  try {
    res = await fetchFn(url, {
      headers: { 'Accept': 'application/json, application/yaml, text/yaml, */*' },
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_LOAD_TIMEOUT_MS),
    });
  } catch (error) {
    throw new SchemaError(`Could not fetch OpenAPI document from ${url}: ${errorMessage(error)}`, { source: url }, { cause: error });
  }
  if (!res.ok) {
    throw new SchemaError(`Fetching OpenAPI document from ${url} returned ${res.status}`, { source: url, status: res.status });
  }
  return res.text();
}

async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    throw new SchemaError(`Could not read OpenAPI document ${path}: ${errorMessage(error)}`, { source: path }, { cause: error });
  }
}

/**
 * Read an OpenAPI document from a file path or an http(s) URL and parse it.
 * Returns the parsed document; building the index is a separate step.
 */
export async function loadDocument(source: string, options: LoadOptions = {}): Promise<unknown> {
  const text = isUrl(source) ? await fetchText(source, options) : await readText(source);
  log.debug(`Loaded OpenAPI document`, { source, bytes: text.length });
  return parseDocumentText(text);
}
