import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import {
  CALL_TOOL,
  DISCOVER_TOOLS,
  GET_TOOL_SCHEMA,
  NotFoundError,
  UpstreamError,
  ValidationError,
  coreTools,
  createLogger,
  errorMessage,
  getMetaTool,
  isScoutError,
  listCategories,
  type CatalogEngine,
  type CatalogIndex,
  type CatalogOperation,
  type CatalogOperationResult,
  type JsonSchema,
} from '@openapi-scout/core';
import { toolSchemaView, type ToolSchemaView } from './tool-schema.js';

export const SERVER_NAME = 'openapi-scout';
export const SERVER_VERSION = '0.3.0';
export const CATEGORIES_URI = 'catalog://categories';

const log = createLogger('mcp');

export interface MCPServerOptions {
  engine: CatalogEngine;
  name?: string;
  version?: string;
}

const DiscoverArguments = z
  .object({
    category: z.string().optional(),
    keyword: z.string().optional(),
    max_results: z.number().optional(),
  })
  .strict();

const SchemaArguments = z.object({ tool_name: z.string() }).strict();

const CallArguments = z
  .object({
    tool_name: z.string(),
    arguments: z.record(z.unknown()).optional(),
  })
  .strict();

/** Meta-tool arguments are checked as strictly as catalog tool arguments */
function metaArguments<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, toolName: string, args: Record<string, unknown>): T {
  const result = schema.safeParse(args);
  if (result.success) return result.data;

  const fields: string[] = [];
  for (const issue of result.error.issues) {
    const names = issue.code === z.ZodIssueCode.unrecognized_keys ? issue.keys : [String(issue.path[0] ?? '')];
    for (const name of names) {
      if (name && !fields.includes(name)) fields.push(name);
    }
  }
  const reasons = result.error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
  throw new ValidationError(`Invalid arguments for ${toolName}: ${reasons.join('; ')}`, fields);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function inputSchema(schema: JsonSchema): Tool['inputSchema'] {
  const { properties, required, additionalProperties } = schema;
  const requiredNames = Array.isArray(required) ? required.filter((r): r is string => typeof r === 'string') : [];
  return {
    type: 'object',
    properties: isRecord(properties) ? properties : {},
    ...(requiredNames.length > 0 ? { required: requiredNames } : {}),
    ...(additionalProperties === false ? { additionalProperties: false } : {}),
  };
}

function listedTool(view: ToolSchemaView): Tool {
  return { name: view.name, description: view.description, inputSchema: inputSchema(view.parameters) };
}

/** Bootstrap tools as an agent sees them, read from one index snapshot */
export function bootstrapTools(index: CatalogIndex, coreOperations: readonly string[]): Tool[] {
  const tools: Tool[] = [];
  for (const name of coreTools(index, coreOperations)) {
    const meta = getMetaTool(name);
    const tool = index.tools.get(name);
    if (meta) tools.push(listedTool(toolSchemaView({ kind: 'meta', tool: meta })));
    else if (tool) tools.push(listedTool(toolSchemaView({ kind: 'catalog', tool })));
  }
  return tools;
}

function textResult(payload: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }] };
}

/** Next step an agent can take to recover from a failed call */
export function recoveryHint(error: unknown, toolName?: string): string | undefined {
  if (error instanceof NotFoundError) {
    return `Call ${DISCOVER_TOOLS} with a keyword or category to find the right tool name.`;
  }
  if (error instanceof ValidationError) {
    const target = toolName ? ` with tool_name "${toolName}"` : '';
    return `Call ${GET_TOOL_SCHEMA}${target} to see the expected parameters.`;
  }
  if (error instanceof UpstreamError) {
    if (error.kind === 'timeout') return 'The upstream API did not answer in time; try again later.';
    if (error.status === 401 || error.status === 403) return 'The upstream API rejected the credentials; check the configured API key.';
    if (error.status === 404) return 'The upstream resource does not exist; check the identifiers passed.';
  }
  return undefined;
}

export function errorResult(error: unknown, toolName?: string): CallToolResult {
  const hint = recoveryHint(error, toolName);
  const body = isScoutError(error)
    ? { error: error.toJSON(), ...(hint ? { hint } : {}) }
    : { error: { code: 'INTERNAL_ERROR', message: errorMessage(error) } };
  return { isError: true, content: [{ type: 'text', text: JSON.stringify(body, null, 2) }] };
}

/** The agent-facing JSON for each operation outcome */
export function formatOutcome(outcome: CatalogOperationResult): unknown {
  switch (outcome.kind) {
    case 'discover': {
      const { tools, total } = outcome.result;
      return {
        tools,
        total,
        ...(tools.length < total
          ? { note: `Showing ${tools.length} of ${total}. Narrow with category or keyword, or raise max_results.` }
          : {}),
      };
    }
    case 'resolve':
      return toolSchemaView({ kind: 'catalog', tool: outcome.tool });
    case 'dispatch':
      return outcome.result.data;
  }
}

/**
 * MCP server over the catalog. On first contact an agent sees only the
 * meta-tools and the configured core operations; everything else is found
 * through discover_tools and invoked through call_tool.
 *
 * Tool listing and calls read the live index, so a reload changes what
 * the next request sees. Arguments reach the engine untouched and are
 * validated there.
 */
export function createMCPServer(options: MCPServerOptions): McpServer {
  const { engine } = options;

  const server = new McpServer(
    {
      name: options.name ?? SERVER_NAME,
      version: options.version ?? SERVER_VERSION,
    },
    { capabilities: { tools: {} } },
  );

  const run = async (operation: CatalogOperation, signal: AbortSignal): Promise<CallToolResult> =>
    textResult(formatOutcome(await engine.execute(operation, { signal })));

  server.server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: bootstrapTools(engine.snapshot(), engine.coreOperations),
  }));

  server.server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args = {} } = request.params;
    // Hints name the meta-tool until its own arguments check out
    let hintTool = name;

    try {
      switch (name) {
        case DISCOVER_TOOLS: {
          const { category, keyword, max_results } = metaArguments(DiscoverArguments, name, args);
          return await run({ kind: 'discover', query: { category, keyword, maxResults: max_results } }, extra.signal);
        }
        case GET_TOOL_SCHEMA: {
          const { tool_name } = metaArguments(SchemaArguments, name, args);
          hintTool = tool_name;
          return textResult(toolSchemaView(engine.describe(tool_name)));
        }
        case CALL_TOOL: {
          const { tool_name, arguments: toolArgs } = metaArguments(CallArguments, name, args);
          hintTool = tool_name;
          return await run({ kind: 'dispatch', invocation: { toolName: tool_name, arguments: toolArgs ?? {} } }, extra.signal);
        }
        default:
          if (!coreTools(engine.snapshot(), engine.coreOperations).includes(name)) {
            throw new NotFoundError(name);
          }
          return await run({ kind: 'dispatch', invocation: { toolName: name, arguments: args } }, extra.signal);
      }
    } catch (error) {
      log.debug(`${name} failed`, { error: errorMessage(error) });
      return errorResult(error, hintTool);
    }
  });

  server.resource(
    'categories',
    CATEGORIES_URI,
    { mimeType: 'application/json', description: 'Tool categories with the number of tools in each' },
    async uri => {
      const current = engine.snapshot();
      return {
        contents: [{
          uri: uri.href,
          mimeType: 'application/json',
          text: JSON.stringify({ title: current.title, version: current.version, categories: listCategories(current) }, null, 2),
        }],
      };
    },
  );

  return server;
}
