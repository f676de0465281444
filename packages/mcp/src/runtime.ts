import {
  CatalogEngine,
  CatalogStore,
  createLogger,
  errorMessage,
  missingCoreOperations,
  setLogLevel,
  type CatalogIndex,
} from '@openapi-scout/core';
import { buildCatalogIndex, createFetchClient, loadDocument } from '@openapi-scout/openapi';
import { simplificationPolicy, type ServerConfig } from './config.js';

const log = createLogger('runtime');

export interface RuntimeOptions {
  /** Used for the upstream API and for fetching a remote document */
  fetchFn?: typeof fetch;
}

export interface CatalogRuntime {
  config: ServerConfig;
  store: CatalogStore;
  engine: CatalogEngine;
  /** Rebuild from the configured source and swap it in; the old index stays on failure */
  reload(): Promise<CatalogIndex>;
}

async function buildFromSource(config: ServerConfig, options: RuntimeOptions): Promise<CatalogIndex> {
  const document = await loadDocument(config.openapi.source, { fetchFn: options.fetchFn });
  return buildCatalogIndex(document, {
    maxRefDepth: config.discovery.maxRefDepth,
    ignoredPrefixes: config.discovery.ignoredPrefixes,
  });
}

/**
 * Load the document, build the index and wire the engine to the upstream
 * client described by the configuration.
 */
export async function createCatalogRuntime(config: ServerConfig, options: RuntimeOptions = {}): Promise<CatalogRuntime> {
  setLogLevel(config.logLevel);

  const store = new CatalogStore(await buildFromSource(config, options));

  const missing = missingCoreOperations(store.current(), config.coreOperations);
  if (missing.length > 0) {
    log.warn(`Core operations not in the catalog, skipped: ${missing.join(', ')}`);
  }

  const client = createFetchClient({
    baseUrl: config.upstream.baseUrl,
    apiKey: config.upstream.apiKey,
    apiKeyHeader: config.upstream.apiKeyHeader,
    fetchFn: options.fetchFn,
  });

  const engine = new CatalogEngine({
    store,
    client,
    timeoutMs: config.upstream.timeoutMs,
    policy: simplificationPolicy(config),
    coreOperations: config.coreOperations,
    discovery: {
      defaultMaxResults: config.discovery.defaultMaxResults,
      maxResultsCeiling: config.discovery.maxResultsCeiling,
    },
  });

  const reload = async (): Promise<CatalogIndex> => {
    try {
      const next = await buildFromSource(config, options);
      store.swap(next);
      log.info(`Reloaded catalog: ${next.stats.operationCount} operations`, { generation: store.getGeneration() });
      return next;
    } catch (error) {
      log.error(`Reload failed, keeping the current catalog: ${errorMessage(error)}`);
      throw error;
    }
  };

  return { config, store, engine, reload };
}
