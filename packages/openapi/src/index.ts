export { buildCatalogIndex } from './catalog-index.js';
export {
  extractTools,
  parseDocumentText,
  toSnakeCase,
  deriveToolName,
  sanitizeParameterName,
} from './converter.js';
export { SchemaGraph, resolvePointer, truncatedMarker, TRUNCATED_DESCRIPTION } from './schema-graph.js';
export { tagOperation, isIgnoredPrefix, meaningfulSegments, FALLBACK_TAG } from './tagger.js';
export type { TaggableOperation } from './tagger.js';
export { createFetchClient, buildUrl, DEFAULT_API_KEY_HEADER } from './http-client.js';
export type { FetchClientOptions } from './http-client.js';
export { loadDocument, isUrl, DEFAULT_LOAD_TIMEOUT_MS } from './loader.js';
export type { LoadOptions } from './loader.js';
export { DEFAULT_MAX_REF_DEPTH, DEFAULT_IGNORED_PREFIXES } from './types.js';
export type { CatalogIndexOptions, OpenAPIDocument } from './types.js';
