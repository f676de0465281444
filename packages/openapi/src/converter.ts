import { parse as parseYAML } from 'yaml';
import type { z } from 'zod';
import {
  SchemaError,
  errorMessage,
  type HttpMethod,
  type JsonSchema,
  type ParameterType,
  type ToolDescriptor,
  type ToolParameter,
} from '@openapi-scout/core';
import { SchemaGraph, isRecord } from './schema-graph.js';
import { isPlaceholder, meaningfulSegments, tagOperation } from './tagger.js';
import {
  DEFAULT_IGNORED_PREFIXES,
  DEFAULT_MAX_REF_DEPTH,
  OperationObjectSchema,
  ParameterObjectSchema,
  RequestBodyObjectSchema,
  ResponseObjectSchema,
  type CatalogIndexOptions,
  type OpenAPIDocument,
  type OperationObject,
  type ParameterObject,
} from './types.js';

const METHODS = ['get', 'post', 'put', 'patch', 'delete'] as const;

const HTTP_METHODS: Record<(typeof METHODS)[number], HttpMethod> = {
  get: 'GET',
  post: 'POST',
  put: 'PUT',
  patch: 'PATCH',
  delete: 'DELETE',
};

const PARAMETER_TYPES: readonly ParameterType[] = ['string', 'number', 'integer', 'boolean', 'array', 'object'];

const PLACEHOLDER = /\{([^}]+)\}/g;

/**
 * Parse OpenAPI text. JSON is tried when the text looks like an object,
 * YAML otherwise (YAML is a superset, so it covers the rest).
 */
export function parseDocumentText(input: string): unknown {
  const trimmed = input.trim();
  try {
    if (trimmed.startsWith('{')) return JSON.parse(trimmed);
    return parseYAML(trimmed);
  } catch (error) {
    throw new SchemaError(`OpenAPI document could not be parsed: ${errorMessage(error)}`, undefined, { cause: error });
  }
}

/** "getQualityProfiles" → "get_quality_profiles", "series-lookup" → "series_lookup" */
export function toSnakeCase(value: string): string {
  return value
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/[^A-Za-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();
}

/** `GET /api/v3/series/{id}` → `get_series_by_id` */
export function deriveToolName(
  method: string,
  path: string,
  ignoredPrefixes: readonly string[] = DEFAULT_IGNORED_PREFIXES,
): string {
  const parts = [method.toLowerCase()];
  for (const segment of meaningfulSegments(path, ignoredPrefixes)) {
    const part = isPlaceholder(segment) ? `by_${toSnakeCase(segment.slice(1, -1))}` : toSnakeCase(segment);
    if (part && part !== 'by_') parts.push(part);
  }
  return parts.join('_');
}

/** Non-identifier characters become "_"; never empty, never starts with a digit */
export function sanitizeParameterName(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9_]/g, '_');
  if (!cleaned) return 'param';
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
}

function uniqueName(base: string, taken: Set<string>): string {
  let name = base;
  for (let n = 2; taken.has(name); n++) name = `${base}_${n}`;
  taken.add(name);
  return name;
}

function schemaType(schema: JsonSchema | undefined, fallback?: string): ParameterType {
  const raw: unknown = schema?.type ?? fallback;
  const declared: unknown = Array.isArray(raw) ? raw.find((t: unknown) => t !== 'null') : raw;
  const match = PARAMETER_TYPES.find(t => t === declared);
  if (match) return match;
  if (schema && isRecord(schema.properties)) return 'object';
  if (schema && schema.items !== undefined) return 'array';
  return 'string';
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function isObjectSchema(schema: JsonSchema): boolean {
  return schema.type === 'object' || (schema.type === undefined && isRecord(schema.properties));
}

/** Merge `allOf` members so their properties can be flattened together */
function mergeAllOf(schema: JsonSchema): JsonSchema {
  if (!Array.isArray(schema.allOf)) return schema;
  const properties: Record<string, unknown> = {};
  const required = new Set<string>();
  for (const part of [schema, ...schema.allOf]) {
    if (!isRecord(part)) continue;
    const merged = mergeAllOf(part === schema ? { ...part, allOf: undefined } : part);
    if (isRecord(merged.properties)) Object.assign(properties, merged.properties);
    for (const r of stringList(merged.required)) required.add(r);
  }
  const { allOf: _allOf, ...rest } = schema;
  return { ...rest, type: 'object', properties, required: Array.from(required) };
}

/** JSON content first, then anything that mentions json, then whatever comes first */
function pickContentSchema(content: Record<string, { schema?: unknown }> | undefined): unknown {
  if (!content) return undefined;
  const types = Object.keys(content);
  const chosen =
    types.find(t => t === 'application/json') ??
    types.find(t => t.includes('json')) ??
    types[0];
  return chosen === undefined ? undefined : content[chosen]?.schema;
}

interface ConversionContext {
  graph: SchemaGraph;
  maxRefDepth: number;
  ignoredPrefixes: readonly string[];
}

function expandSchema(ctx: ConversionContext, schema: unknown): JsonSchema | undefined {
  const expanded = ctx.graph.expand(schema, ctx.maxRefDepth);
  return isRecord(expanded) ? expanded : undefined;
}

/** Follow a `$ref` on a parameter, request body or response object */
function deref(ctx: ConversionContext, value: unknown): unknown {
  let current = value;
  const seen = new Set<string>();
  while (isRecord(current) && typeof current.$ref === 'string') {
    if (seen.has(current.$ref)) throw new SchemaError(`Reference cycle at ${current.$ref}`, { ref: current.$ref });
    seen.add(current.$ref);
    current = ctx.graph.resolveRef(current.$ref);
  }
  return current;
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, where: string): T {
  const result = schema.safeParse(value);
  if (!result.success) throw new SchemaError(`Invalid ${where}: ${result.error.message}`, { where });
  return result.data;
}

function parameterKey(param: ParameterObject): string {
  return `${param.in}:${param.name}`;
}

/** Path-item parameters first; operation parameters replace same name and location */
function collectParameters(
  ctx: ConversionContext,
  pathParams: unknown[],
  opParams: unknown[],
  where: string,
): ParameterObject[] {
  const merged = new Map<string, ParameterObject>();
  for (const raw of [...pathParams, ...opParams]) {
    const param = parseWith(ParameterObjectSchema, deref(ctx, raw), `parameter of ${where}`);
    merged.set(parameterKey(param), param);
  }
  return Array.from(merged.values());
}

function toToolParameter(
  ctx: ConversionContext,
  param: ParameterObject,
  location: ToolParameter['location'],
  taken: Set<string>,
): ToolParameter {
  const schema: JsonSchema | undefined = param.schema
    ? expandSchema(ctx, param.schema)
    : param.type
      ? { type: param.type, ...(param.enum ? { enum: param.enum } : {}), ...(param.items ? { items: param.items } : {}) }
      : undefined;
  const name = uniqueName(sanitizeParameterName(param.name), taken);
  const descriptionFromSchema = typeof schema?.description === 'string' ? schema.description : undefined;

  const out: ToolParameter = {
    name,
    location,
    type: schemaType(schema, param.type),
    required: location === 'path' ? true : param.required ?? false,
    description: param.description ?? descriptionFromSchema ?? param.name,
  };
  if (schema) out.schema = schema;
  if (name !== param.name) out.wireName = param.name;
  return out;
}

interface BodyConversion {
  parameters: ToolParameter[];
  schema?: JsonSchema;
  wholeBody: boolean;
}

function convertBody(
  ctx: ConversionContext,
  rawSchema: unknown,
  required: boolean,
  description: string | undefined,
  taken: Set<string>,
): BodyConversion {
  const schema = expandSchema(ctx, rawSchema);
  if (!schema) return { parameters: [], wholeBody: false };

  const flat = mergeAllOf(schema);
  if (!isObjectSchema(flat) || !isRecord(flat.properties) || Object.keys(flat.properties).length === 0) {
    const name = uniqueName('body', taken);
    return {
      schema,
      wholeBody: true,
      parameters: [
        {
          name,
          location: 'body',
          type: schemaType(schema),
          required,
          description: description ?? (typeof schema.description === 'string' ? schema.description : 'Request body'),
          schema,
          ...(name !== 'body' ? { wireName: 'body' } : {}),
        },
      ],
    };
  }

  const requiredProps = new Set(stringList(flat.required));
  const parameters: ToolParameter[] = [];
  for (const [prop, rawProp] of Object.entries(flat.properties)) {
    const propSchema = isRecord(rawProp) ? rawProp : {};
    if (propSchema.readOnly === true) continue;
    const base = sanitizeParameterName(prop);
    const name = uniqueName(taken.has(base) ? `body_${base}` : base, taken);
    const param: ToolParameter = {
      name,
      location: 'body',
      type: schemaType(propSchema),
      required: requiredProps.has(prop),
      description: typeof propSchema.description === 'string' ? propSchema.description : prop,
      schema: propSchema,
    };
    if (name !== prop) param.wireName = prop;
    parameters.push(param);
  }
  return { schema, wholeBody: false, parameters };
}

function responseSchema(ctx: ConversionContext, operation: OperationObject, where: string): JsonSchema | undefined {
  const responses = operation.responses ?? {};
  const codes = Object.keys(responses).filter(c => /^2\d\d$|^2XX$/i.test(c)).sort();
  const code = codes[0] ?? (responses.default !== undefined ? 'default' : undefined);
  if (code === undefined) return undefined;

  const response = parseWith(ResponseObjectSchema, deref(ctx, responses[code]), `response ${code} of ${where}`);
  const raw = response.content ? pickContentSchema(response.content) : response.schema;
  return raw === undefined ? undefined : expandSchema(ctx, raw);
}

function convertOperation(
  ctx: ConversionContext,
  method: (typeof METHODS)[number],
  path: string,
  operation: OperationObject,
  pathParams: unknown[],
  name: string,
): ToolDescriptor {
  const httpMethod = HTTP_METHODS[method];
  const where = `${httpMethod} ${path}`;
  const declared = collectParameters(ctx, pathParams, operation.parameters ?? [], where);

  const placeholders = Array.from(path.matchAll(PLACEHOLDER), m => m[1]);
  const taken = new Set<string>();
  const parameters: ToolParameter[] = [];
  let swaggerBody: ParameterObject | undefined;

  for (const param of declared) {
    switch (param.in) {
      case 'path':
        if (!placeholders.includes(param.name)) {
          throw new SchemaError(`Path parameter "${param.name}" of ${where} has no placeholder in the path`, {
            path,
            parameter: param.name,
          });
        }
        parameters.push(toToolParameter(ctx, param, 'path', taken));
        break;
      case 'query':
      case 'header':
        parameters.push(toToolParameter(ctx, param, param.in, taken));
        break;
      case 'body':
        swaggerBody = param;
        break;
      // cookie and formData parameters are not exposed
    }
  }

  for (const placeholder of placeholders) {
    if (declared.some(p => p.in === 'path' && p.name === placeholder)) continue;
    const name = uniqueName(sanitizeParameterName(placeholder), taken);
    parameters.push({
      name,
      location: 'path',
      type: 'string',
      required: true,
      description: placeholder,
      ...(name !== placeholder ? { wireName: placeholder } : {}),
    });
  }

  let body: BodyConversion = { parameters: [], wholeBody: false };
  if (operation.requestBody !== undefined) {
    const requestBody = parseWith(RequestBodyObjectSchema, deref(ctx, operation.requestBody), `request body of ${where}`);
    const raw = pickContentSchema(requestBody.content);
    if (raw !== undefined) {
      body = convertBody(ctx, raw, requestBody.required ?? false, requestBody.description, taken);
    }
  } else if (swaggerBody?.schema) {
    body = convertBody(ctx, swaggerBody.schema, swaggerBody.required ?? false, swaggerBody.description, taken);
  }
  parameters.push(...body.parameters);

  const summary = (operation.summary ?? operation.description ?? '').trim() || where;

  const tool: ToolDescriptor = {
    name,
    summary,
    method: httpMethod,
    path,
    parameters,
    tags: tagOperation({ method: httpMethod, path, declaredTags: operation.tags }, ctx.ignoredPrefixes),
  };
  if (body.schema) tool.requestBodySchema = body.schema;
  if (body.wholeBody) tool.wholeBody = true;
  const response = responseSchema(ctx, operation, where);
  if (response) tool.responseSchema = response;
  return tool;
}

/**
 * Turn every operation in the document into a tool descriptor, in document
 * order. Names come from operationId when present, otherwise from method and
 * path; a repeated name gets a numeric suffix.
 */
export function extractTools(
  doc: OpenAPIDocument,
  graph: SchemaGraph,
  options: CatalogIndexOptions = {},
): ToolDescriptor[] {
  const ctx: ConversionContext = {
    graph,
    maxRefDepth: options.maxRefDepth ?? DEFAULT_MAX_REF_DEPTH,
    ignoredPrefixes: options.ignoredPrefixes ?? DEFAULT_IGNORED_PREFIXES,
  };
  const names = new Set<string>();
  const tools: ToolDescriptor[] = [];

  for (const [path, rawItem] of Object.entries(doc.paths)) {
    const pathItem = deref(ctx, rawItem);
    if (!isRecord(pathItem)) throw new SchemaError(`Path item ${path} is not an object`, { path });
    const pathParams = Array.isArray(pathItem.parameters) ? pathItem.parameters : [];

    for (const method of METHODS) {
      if (pathItem[method] === undefined) continue;
      const operation = parseWith(OperationObjectSchema, pathItem[method], `operation ${method.toUpperCase()} ${path}`);
      const base = operation.operationId
        ? toSnakeCase(operation.operationId) || deriveToolName(method, path, ctx.ignoredPrefixes)
        : deriveToolName(method, path, ctx.ignoredPrefixes);
      const name = uniqueName(base, names);
      tools.push(convertOperation(ctx, method, path, operation, pathParams, name));
    }
  }

  return tools;
}
