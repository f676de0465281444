import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parse as parseYAML } from 'yaml';
import { z } from 'zod';
import {
  DEFAULT_CORE_OPERATIONS,
  DEFAULT_MAX_RESULTS,
  DEFAULT_SIMPLIFICATION_POLICY,
  DEFAULT_TIMEOUT_MS,
  MAX_RESULTS_CEILING,
  errorMessage,
  type SimplificationPolicy,
  type SimplifyRule,
} from '@openapi-scout/core';
import { DEFAULT_API_KEY_HEADER, DEFAULT_IGNORED_PREFIXES, DEFAULT_MAX_REF_DEPTH } from '@openapi-scout/openapi';

/** The media-server description shipped with this package */
export const BUNDLED_DOCUMENT = fileURLToPath(new URL('../openapi/media-server.yaml', import.meta.url));

export const DEFAULT_UPSTREAM_URL = 'http://localhost:8989';

const SimplifyRuleSchema = z
  .object({
    dropFields: z.array(z.string()).optional(),
    maxDepth: z.number().int().min(1).optional(),
    truncate: z.record(z.number().int().min(1)).optional(),
  })
  .strict();

export const ServerConfigSchema = z.object({
  upstream: z
    .object({
      baseUrl: z.string().url().default(DEFAULT_UPSTREAM_URL),
      apiKey: z.string().optional(),
      apiKeyHeader: z.string().min(1).default(DEFAULT_API_KEY_HEADER),
      timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    })
    .default({}),
  openapi: z
    .object({
      source: z.string().min(1).default(BUNDLED_DOCUMENT),
    })
    .default({}),
  discovery: z
    .object({
      defaultMaxResults: z.coerce.number().int().min(1).default(DEFAULT_MAX_RESULTS),
      maxResultsCeiling: z.coerce.number().int().min(1).default(MAX_RESULTS_CEILING),
      maxRefDepth: z.coerce.number().int().min(0).default(DEFAULT_MAX_REF_DEPTH),
      ignoredPrefixes: z.array(z.string()).default([...DEFAULT_IGNORED_PREFIXES]),
    })
    .default({}),
  coreOperations: z.array(z.string().min(1)).default([...DEFAULT_CORE_OPERATIONS]),
  simplification: z
    .object({
      default: SimplifyRuleSchema.optional(),
      categories: z.record(SimplifyRuleSchema).optional(),
    })
    .strict()
    .optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

/** Values given on the command line; they win over every other source */
export interface ConfigOverrides {
  baseUrl?: string;
  apiKey?: string;
  apiKeyHeader?: string;
  timeoutMs?: number;
  openapiSource?: string;
  logLevel?: string;
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  ${issues.join('\n  ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

type Layer = Record<string, unknown>;

function isPlainObject(value: unknown): value is Layer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Later layers win; nested objects merge, arrays and scalars replace */
export function mergeLayers(...layers: Layer[]): Layer {
  const out: Layer = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      const current = out[key];
      out[key] = isPlainObject(current) && isPlainObject(value) ? mergeLayers(current, value) : value;
    }
  }
  return out;
}

/** Replace `${NAME}` in every string value with the environment variable */
export function interpolateEnv(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, name: string) => env[name] ?? '');
  }
  if (Array.isArray(value)) return value.map(v => interpolateEnv(v, env));
  if (isPlainObject(value)) {
    const out: Layer = {};
    for (const [k, v] of Object.entries(value)) out[k] = interpolateEnv(v, env);
    return out;
  }
  return value;
}

function fileLayer(path: string, env: NodeJS.ProcessEnv): Layer {
  let parsed: unknown;
  try {
    parsed = parseYAML(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Could not read config file ${path}: ${errorMessage(error)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) throw new ConfigError(`Config file ${path} must contain an object`);
  const interpolated = interpolateEnv(parsed, env);
  return isPlainObject(interpolated) ? interpolated : {};
}

function envLayer(env: NodeJS.ProcessEnv): Layer {
  return {
    upstream: {
      baseUrl: env.UPSTREAM_URL || undefined,
      apiKey: env.UPSTREAM_API_KEY || undefined,
      apiKeyHeader: env.UPSTREAM_API_KEY_HEADER || undefined,
      timeoutMs: env.UPSTREAM_TIMEOUT_MS || undefined,
    },
    openapi: { source: env.OPENAPI_SOURCE || undefined },
    logLevel: env.LOG_LEVEL?.toLowerCase() || undefined,
  };
}

function overrideLayer(overrides: ConfigOverrides): Layer {
  return {
    upstream: {
      baseUrl: overrides.baseUrl,
      apiKey: overrides.apiKey,
      apiKeyHeader: overrides.apiKeyHeader,
      timeoutMs: overrides.timeoutMs,
    },
    openapi: { source: overrides.openapiSource },
    logLevel: overrides.logLevel?.toLowerCase(),
  };
}

/**
 * Resolve the server configuration: defaults, then the config file
 * (`configPath` or OPENAPI_SCOUT_CONFIG), then environment, then overrides.
 */
export function loadConfig(options: LoadConfigOptions = {}): ServerConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? (env.OPENAPI_SCOUT_CONFIG || undefined);

  const raw = mergeLayers(
    configPath ? fileLayer(configPath, env) : {},
    envLayer(env),
    overrideLayer(options.overrides ?? {}),
  );

  const result = ServerConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError('Invalid configuration', issues);
  }
  if (result.data.discovery.defaultMaxResults > result.data.discovery.maxResultsCeiling) {
    throw new ConfigError('Invalid configuration', ['discovery.defaultMaxResults: must not exceed discovery.maxResultsCeiling']);
  }
  return result.data;
}

export interface ServerArgs {
  configPath?: string;
  overrides: ConfigOverrides;
  help: boolean;
}

/** Flags of the openapi-scout-mcp binary */
export function parseServerArgs(args: string[]): ServerArgs {
  const parsed: ServerArgs = { overrides: {}, help: false };

  const value = (i: number, flag: string): string => {
    const v = args[i];
    if (!v || v.startsWith('--')) throw new ConfigError(`Missing value for ${flag}`);
    return v;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--config' || arg === '-c') {
      parsed.configPath = value(++i, arg);
    } else if (arg === '--openapi' || arg === '-o') {
      parsed.overrides.openapiSource = value(++i, arg);
    } else if (arg === '--url' || arg === '-u') {
      parsed.overrides.baseUrl = value(++i, arg);
    } else if (arg === '--api-key' || arg === '-k') {
      parsed.overrides.apiKey = value(++i, arg);
    } else if (arg === '--log-level') {
      parsed.overrides.logLevel = value(++i, arg);
    } else if (arg === '--help' || arg === '-h') {
      parsed.help = true;
    } else {
      throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }
  return parsed;
}

function mergeRule(base: SimplifyRule | undefined, override: SimplifyRule | undefined): SimplifyRule {
  return { ...(base ?? {}), ...(override ?? {}) };
}

/** Shipped simplification policy with configured rules laid over it, rule by rule */
export function simplificationPolicy(config: ServerConfig): SimplificationPolicy {
  const overrides = config.simplification;
  if (!overrides) return DEFAULT_SIMPLIFICATION_POLICY;

  const categories: Record<string, SimplifyRule> = { ...DEFAULT_SIMPLIFICATION_POLICY.categories };
  for (const [tag, rule] of Object.entries(overrides.categories ?? {})) {
    categories[tag] = mergeRule(categories[tag], rule);
  }
  return {
    default: mergeRule(DEFAULT_SIMPLIFICATION_POLICY.default, overrides.default),
    categories,
  };
}
