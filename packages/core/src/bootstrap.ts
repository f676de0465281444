import type { CatalogIndex, JsonSchema } from './types.js';

export interface MetaTool {
  name: string;
  summary: string;
  tags: string[];
  inputSchema: JsonSchema;
}

export const DISCOVER_TOOLS = 'discover_tools';
export const GET_TOOL_SCHEMA = 'get_tool_schema';
export const CALL_TOOL = 'call_tool';

/** Upper bound on the bootstrap set, meta-tools included */
export const CORE_TOOL_LIMIT = 8;

export const DEFAULT_CORE_OPERATIONS = [
  'search_series',
  'get_series',
  'get_calendar',
  'get_quality_profiles',
];

/**
 * Hand-authored tools that let an agent find and call everything else.
 * They are not derived from the OpenAPI document and never appear in the index.
 */
export const META_TOOLS: readonly MetaTool[] = [
  {
    name: DISCOVER_TOOLS,
    summary: 'Find API tools by category or keyword. Returns names and summaries only; use get_tool_schema before calling one.',
    tags: ['meta'],
    inputSchema: {
      type: 'object',
      properties: {
        category: {
          type: 'string',
          description: 'Category to list, e.g. "series", "calendar", "system", "episode", "command", "quality". "all" disables the filter.',
        },
        keyword: {
          type: 'string',
          description: 'Word to match against tool names, categories and summaries',
        },
        max_results: {
          type: 'integer',
          description: 'Maximum number of tools to return',
          default: 10,
        },
      },
      required: [],
    },
  },
  {
    name: GET_TOOL_SCHEMA,
    summary: 'Get the full parameter and response schema for one tool by name.',
    tags: ['meta'],
    inputSchema: {
      type: 'object',
      properties: {
        tool_name: { type: 'string', description: 'Name returned by discover_tools' },
      },
      required: ['tool_name'],
    },
  },
  {
    name: CALL_TOOL,
    summary: 'Call any discovered tool with arguments matching its schema.',
    tags: ['meta'],
    inputSchema: {
      type: 'object',
      properties: {
        tool_name: { type: 'string', description: 'Name returned by discover_tools' },
        arguments: { type: 'object', description: 'Arguments keyed by parameter name', additionalProperties: true },
      },
      required: ['tool_name'],
    },
  },
];

export function getMetaTool(name: string): MetaTool | undefined {
  return META_TOOLS.find(t => t.name === name);
}

/** Input schema of a meta-tool, for get_tool_schema */
export function describeMetaTool(name: string): JsonSchema | undefined {
  return getMetaTool(name)?.inputSchema;
}

export function isMetaTool(name: string): boolean {
  return getMetaTool(name) !== undefined;
}

/**
 * The tools an agent sees before it has discovered anything:
 * meta-tools first, then the configured operations the catalog actually has.
 */
export function coreTools(index: CatalogIndex, coreOperations: readonly string[] = DEFAULT_CORE_OPERATIONS): string[] {
  const names = META_TOOLS.map(t => t.name);
  for (const op of coreOperations) {
    if (names.length >= CORE_TOOL_LIMIT) break;
    if (index.tools.has(op) && !names.includes(op)) names.push(op);
  }
  return names;
}

/** Configured core operations that the catalog does not contain */
export function missingCoreOperations(index: CatalogIndex, coreOperations: readonly string[]): string[] {
  return coreOperations.filter(op => !index.tools.has(op));
}
