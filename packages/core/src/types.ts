// ---- JSON ----

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** A JSON Schema fragment, as found in an OpenAPI document. */
export type JsonSchema = Record<string, unknown>;

// ---- Catalog ----

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type ParameterLocation = 'path' | 'query' | 'header' | 'body';

export type ParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

export interface ToolParameter {
  /** Agent-facing name, unique within the tool */
  name: string;
  location: ParameterLocation;
  type: ParameterType;
  required: boolean;
  description: string;
  /** Fully expanded schema for the value */
  schema?: JsonSchema;
  /** Upstream spelling, only set when it differs from `name` */
  wireName?: string;
}

export interface ToolDescriptor {
  name: string;
  summary: string;
  method: HttpMethod;
  /** Path template relative to the upstream base URL, may contain {param} placeholders */
  path: string;
  parameters: ToolParameter[];
  requestBodySchema?: JsonSchema;
  /** Set when the body is not an object and travels as the single `body` parameter */
  wholeBody?: boolean;
  responseSchema?: JsonSchema;
  /** Lower-case category labels, sorted, never empty */
  tags: string[];
}

export interface CatalogStats {
  operationCount: number;
  tagCount: number;
  /** Component schemas that take part in a reference cycle */
  cyclicSchemas: string[];
}

/**
 * Read-only snapshot of every tool derived from one OpenAPI document.
 * Built once; a rebuild produces a new index rather than mutating this one.
 */
export interface CatalogIndex {
  readonly title: string;
  readonly version: string;
  readonly tools: ReadonlyMap<string, ToolDescriptor>;
  readonly byTag: ReadonlyMap<string, ReadonlySet<string>>;
  readonly byKeyword: ReadonlyMap<string, ReadonlySet<string>>;
  readonly stats: CatalogStats;
}

// ---- Discovery ----

export interface DiscoveryQuery {
  category?: string;
  keyword?: string;
  maxResults?: number;
}

export interface DiscoveredTool {
  name: string;
  summary: string;
  tags: string[];
  matchScore: number;
}

export interface DiscoveryResult {
  tools: DiscoveredTool[];
  /** Matches before the result limit was applied */
  total: number;
}

// ---- Dispatch ----

export interface Invocation {
  toolName: string;
  arguments: Record<string, unknown>;
}

export interface UpstreamRequest {
  method: HttpMethod;
  /** Path with placeholders substituted */
  path: string;
  query: Record<string, string | string[]>;
  headers: Record<string, string>;
  body?: unknown;
}

export interface UpstreamResponse {
  status: number;
  data: unknown;
}

/**
 * The HTTP client that talks to the upstream API. It must honour `signal`
 * and report transport failures by rejecting.
 */
export interface UpstreamClient {
  send(request: UpstreamRequest, options: { signal: AbortSignal }): Promise<UpstreamResponse>;
}

export interface DispatchResult {
  toolName: string;
  status: number;
  data: unknown;
}

// ---- Simplification ----

export interface SimplifyRule {
  /** Keys removed wherever they appear */
  dropFields?: string[];
  /** Nested values below this depth collapse to "[truncated]" */
  maxDepth?: number;
  /** String fields shortened to the given length */
  truncate?: Record<string, number>;
}

export interface SimplificationPolicy {
  default: SimplifyRule;
  /** Rules keyed by tool tag */
  categories: Record<string, SimplifyRule>;
}

// ---- Engine operations ----

export type CatalogOperation =
  | { kind: 'discover'; query: DiscoveryQuery }
  | { kind: 'resolve'; toolName: string }
  | { kind: 'dispatch'; invocation: Invocation };

export type CatalogOperationResult =
  | { kind: 'discover'; result: DiscoveryResult }
  | { kind: 'resolve'; tool: ToolDescriptor }
  | { kind: 'dispatch'; result: DispatchResult };

export interface OperationContext {
  /** Caller-imposed deadline or cancellation */
  signal?: AbortSignal;
}
