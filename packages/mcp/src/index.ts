export { createMCPServer, bootstrapTools, formatOutcome, errorResult, recoveryHint, SERVER_NAME, SERVER_VERSION, CATEGORIES_URI } from './mcp-server.js';
export type { MCPServerOptions } from './mcp-server.js';
export { descriptorToInputSchema, toolSchemaView } from './tool-schema.js';
export type { ToolSchemaView } from './tool-schema.js';
export {
  loadConfig,
  parseServerArgs,
  mergeLayers,
  interpolateEnv,
  simplificationPolicy,
  ServerConfigSchema,
  ConfigError,
  BUNDLED_DOCUMENT,
  DEFAULT_UPSTREAM_URL,
} from './config.js';
export type { ServerConfig, ConfigOverrides, LoadConfigOptions, ServerArgs } from './config.js';
export { createCatalogRuntime } from './runtime.js';
export type { CatalogRuntime, RuntimeOptions } from './runtime.js';
export { serveStdio } from './stdio.js';
