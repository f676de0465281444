export { CatalogEngine } from './engine.js';
export type { CatalogEngineConfig, ToolDescription } from './engine.js';
export { CatalogStore } from './catalog-store.js';
export {
  discover,
  listCategories,
  scoreTool,
  tokenize,
  normalizeCategory,
  normalizeKeyword,
  clampMaxResults,
  DEFAULT_MAX_RESULTS,
  MAX_RESULTS_CEILING,
} from './discovery.js';
export type { DiscoveryOptions } from './discovery.js';
export { resolve } from './resolver.js';
export { dispatch, buildRequest, DEFAULT_TIMEOUT_MS } from './dispatcher.js';
export type { DispatcherOptions } from './dispatcher.js';
export { validateArguments } from './arguments.js';
export { simplifyResponse, resolveRule, DEFAULT_SIMPLIFICATION_POLICY, TRUNCATED_VALUE } from './simplify.js';
export {
  META_TOOLS,
  DISCOVER_TOOLS,
  GET_TOOL_SCHEMA,
  CALL_TOOL,
  CORE_TOOL_LIMIT,
  DEFAULT_CORE_OPERATIONS,
  coreTools,
  getMetaTool,
  describeMetaTool,
  isMetaTool,
  missingCoreOperations,
} from './bootstrap.js';
export type { MetaTool } from './bootstrap.js';
export {
  ScoutError,
  SchemaError,
  NotFoundError,
  ValidationError,
  UpstreamError,
  isScoutError,
  errorMessage,
} from './errors.js';
export type { ScoutErrorCode, ScoutErrorJSON, UpstreamFailureKind } from './errors.js';
export { createLogger, setLogLevel, parseLogLevel } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export type {
  JsonValue,
  JsonSchema,
  HttpMethod,
  ParameterLocation,
  ParameterType,
  ToolParameter,
  ToolDescriptor,
  CatalogStats,
  CatalogIndex,
  DiscoveryQuery,
  DiscoveredTool,
  DiscoveryResult,
  Invocation,
  UpstreamRequest,
  UpstreamResponse,
  UpstreamClient,
  DispatchResult,
  SimplifyRule,
  SimplificationPolicy,
  CatalogOperation,
  CatalogOperationResult,
  OperationContext,
} from './types.js';
