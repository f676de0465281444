import {
  SchemaError,
  createLogger,
  tokenize,
  type CatalogIndex,
  type ToolDescriptor,
} from '@openapi-scout/core';
import { extractTools, parseDocumentText } from './converter.js';
import { SchemaGraph, isRecord } from './schema-graph.js';
import { OpenAPIDocumentSchema, type CatalogIndexOptions } from './types.js';

const log = createLogger('index');

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function addTo(map: Map<string, Set<string>>, key: string, name: string): void {
  const set = map.get(key);
  if (set) set.add(name);
  else map.set(key, new Set([name]));
}

function keywordTokens(tool: ToolDescriptor): string[] {
  return tokenize([tool.name, tool.summary, ...tool.tags].join(' '));
}

/**
 * Build the catalog from an OpenAPI document (parsed object or JSON/YAML text).
 * All references are checked and expanded here; the returned index is frozen
 * and never changes afterwards.
 */
export function buildCatalogIndex(input: unknown, options: CatalogIndexOptions = {}): CatalogIndex {
  const raw = typeof input === 'string' ? parseDocumentText(input) : input;
  if (!isRecord(raw)) throw new SchemaError('OpenAPI document must be an object');
  if (!isRecord(raw.paths)) throw new SchemaError('OpenAPI document has no "paths" object');

  const parsed = OpenAPIDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SchemaError(`OpenAPI document is malformed: ${parsed.error.message}`);
  }
  const doc = parsed.data;

  const graph = SchemaGraph.build(raw);
  const descriptors = extractTools(doc, graph, options);

  const tools = new Map<string, ToolDescriptor>();
  const byTag = new Map<string, Set<string>>();
  const byKeyword = new Map<string, Set<string>>();

  for (const tool of descriptors) {
    tools.set(tool.name, deepFreeze(tool));
    for (const tag of tool.tags) addTo(byTag, tag, tool.name);
    for (const token of keywordTokens(tool)) addTo(byKeyword, token, tool.name);
  }

  const cyclicSchemas = graph.cyclicSchemas();
  const version = doc.info?.version;
  const index: CatalogIndex = {
    title: doc.info?.title ?? 'Untitled API',
    version: version === undefined ? '0.0.0' : String(version),
    tools: Object.freeze(tools),
    byTag: Object.freeze(byTag),
    byKeyword: Object.freeze(byKeyword),
    stats: Object.freeze({
      operationCount: tools.size,
      tagCount: byTag.size,
      cyclicSchemas,
    }),
  };

  log.info(`Indexed ${tools.size} operations in ${byTag.size} categories`, {
    title: index.title,
    ...(cyclicSchemas.length > 0 ? { cyclicSchemas } : {}),
  });

  return Object.freeze(index);
}
