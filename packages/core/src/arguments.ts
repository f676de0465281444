import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { ToolDescriptor, ToolParameter } from './types.js';

const INTEGER_STRING = /^-?\d+$/;
const NUMBER_STRING = /^-?\d+(\.\d+)?$/;

function stringEnum(param: ToolParameter): [string, ...string[]] | undefined {
  const values = param.schema?.enum;
  if (!Array.isArray(values)) return undefined;
  const strings = values.filter((v): v is string => typeof v === 'string');
  if (strings.length === 0 || strings.length !== values.length) return undefined;
  const [first, ...rest] = strings;
  return [first, ...rest];
}

/**
 * Schema for one argument. Path, query and header values end up in a URL
 * or header anyway, so numbers and booleans there also accept their string form.
 */
function fieldSchema(param: ToolParameter): z.ZodTypeAny {
  const inUrl = param.location !== 'body';

  switch (param.type) {
    case 'integer':
      return inUrl ? z.union([z.number().int(), z.string().regex(INTEGER_STRING)]) : z.number().int();
    case 'number':
      return inUrl ? z.union([z.number(), z.string().regex(NUMBER_STRING)]) : z.number();
    case 'boolean':
      return inUrl ? z.union([z.boolean(), z.enum(['true', 'false'])]) : z.boolean();
    case 'array':
      return z.array(z.unknown());
    case 'object':
      return z.record(z.unknown());
    default: {
      const values = stringEnum(param);
      return values ? z.enum(values) : z.string();
    }
  }
}

/** One zod field per parameter, keyed by the agent-facing name */
export function buildArgumentsShape(tool: ToolDescriptor): z.ZodRawShape {
  const shape: z.ZodRawShape = {};
  for (const param of tool.parameters) {
    const field = fieldSchema(param).describe(param.description);
    shape[param.name] = param.required ? field : field.optional();
  }
  return shape;
}

export function buildArgumentsSchema(tool: ToolDescriptor): z.ZodType<Record<string, unknown>> {
  return z.object(buildArgumentsShape(tool)).strict();
}

/**
 * Check an invocation's arguments against the tool's parameter list.
 * Every problem is collected into one ValidationError so the agent can fix
 * all of them in its next call.
 */
export function validateArguments(tool: ToolDescriptor, args: Record<string, unknown>): Record<string, unknown> {
  const result = buildArgumentsSchema(tool).safeParse(args);
  if (result.success) return result.data;

  // A required union field that is absent reports as invalid_union, so
  // absence is read from the arguments directly.
  const missing = tool.parameters
    .filter(p => p.required && args[p.name] === undefined)
    .map(p => p.name);
  const unknown: string[] = [];
  const invalid: string[] = [];

  for (const issue of result.error.issues) {
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      unknown.push(...issue.keys);
      continue;
    }
    const field = String(issue.path[0] ?? '');
    if (!field || missing.includes(field) || invalid.includes(field)) continue;
    invalid.push(field);
  }

  const parts: string[] = [];
  if (missing.length > 0) parts.push(`missing required parameter(s): ${missing.join(', ')}`);
  if (unknown.length > 0) parts.push(`unknown argument(s): ${unknown.join(', ')}`);
  if (invalid.length > 0) parts.push(`invalid value for: ${invalid.join(', ')}`);

  throw new ValidationError(
    `Invalid arguments for ${tool.name}: ${parts.join('; ')}`,
    [...missing, ...unknown, ...invalid],
    { missing, unknown, invalid },
  );
}
