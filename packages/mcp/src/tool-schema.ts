import type { MetaTool, ToolDescriptor, ToolDescription, ToolParameter, JsonSchema } from '@openapi-scout/core';

export interface ToolSchemaView {
  name: string;
  description: string;
  method?: string;
  path?: string;
  tags: string[];
  parameters: JsonSchema;
  returns: JsonSchema;
}

const GENERIC_RETURNS: JsonSchema = { type: 'object', description: 'Response from the upstream API' };

function paramToJsonSchema(param: ToolParameter): JsonSchema {
  const schema: JsonSchema = { ...(param.schema ?? {}), type: param.type, description: param.description };
  if (param.location !== 'body') schema['x-in'] = param.location;
  return schema;
}

/**
 * JSON Schema for a tool's arguments, keyed by the names an agent passes.
 * Parameter schemas are already expanded, so nothing here needs resolving.
 */
export function descriptorToInputSchema(tool: ToolDescriptor): JsonSchema {
  const properties: Record<string, JsonSchema> = {};
  const required: string[] = [];

  for (const param of tool.parameters) {
    properties[param.name] = paramToJsonSchema(param);
    if (param.required) required.push(param.name);
  }

  return {
    type: 'object',
    properties,
    ...(required.length > 0 ? { required } : {}),
    additionalProperties: false,
  };
}

function metaToolView(tool: MetaTool): ToolSchemaView {
  return {
    name: tool.name,
    description: tool.summary,
    tags: [...tool.tags],
    parameters: tool.inputSchema,
    returns: GENERIC_RETURNS,
  };
}

/** What get_tool_schema hands back for one tool */
export function toolSchemaView(description: ToolDescription): ToolSchemaView {
  if (description.kind === 'meta') return metaToolView(description.tool);
  const tool = description.tool;
  return {
    name: tool.name,
    description: tool.summary,
    method: tool.method,
    path: tool.path,
    tags: [...tool.tags],
    parameters: descriptorToInputSchema(tool),
    returns: tool.responseSchema ?? GENERIC_RETURNS,
  };
}
