import { validateArguments } from './arguments.js';
import { UpstreamError, ValidationError, errorMessage, isScoutError } from './errors.js';
import { createLogger } from './logger.js';
import { resolve } from './resolver.js';
import { DEFAULT_SIMPLIFICATION_POLICY, simplifyResponse } from './simplify.js';
import type {
  CatalogIndex,
  DispatchResult,
  Invocation,
  OperationContext,
  SimplificationPolicy,
  ToolDescriptor,
  UpstreamClient,
  UpstreamRequest,
  UpstreamResponse,
} from './types.js';

export const DEFAULT_TIMEOUT_MS = 30_000;
const MAX_ERROR_BODY = 500;

const log = createLogger('dispatch');

export interface DispatcherOptions {
  client: UpstreamClient;
  /** Deadline for one upstream call */
  timeoutMs?: number;
  policy?: SimplificationPolicy;
}

function isSubstitutable(value: unknown): value is string | number | boolean {
  if (typeof value === 'string') return value.trim().length > 0;
  return typeof value === 'number' || typeof value === 'boolean';
}

function queryValue(value: unknown): string | string[] {
  if (Array.isArray(value)) return value.map(v => (typeof v === 'object' && v !== null ? JSON.stringify(v) : String(v)));
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

/**
 * Map validated arguments onto the request shape: placeholders substituted,
 * query and header values stringified, body parameters collected under
 * their upstream names.
 */
export function buildRequest(tool: ToolDescriptor, args: Record<string, unknown>): UpstreamRequest {
  let path = tool.path;
  const query: Record<string, string | string[]> = {};
  const headers: Record<string, string> = {};
  const body: Record<string, unknown> = {};
  let rawBody: unknown;
  let hasBody = false;

  for (const param of tool.parameters) {
    const value = args[param.name];
    const wireName = param.wireName ?? param.name;

    if (param.location === 'path') {
      if (!isSubstitutable(value)) {
        throw new ValidationError(
          `Path parameter "${param.name}" of ${tool.name} needs a non-empty string or number`,
          [param.name],
        );
      }
      path = path.replace(`{${wireName}}`, encodeURIComponent(String(value)));
      continue;
    }

    if (value === undefined) continue;

    switch (param.location) {
      case 'query':
        query[wireName] = queryValue(value);
        break;
      case 'header':
        headers[wireName] = String(value);
        break;
      case 'body':
        hasBody = true;
        if (tool.wholeBody) {
          rawBody = value;
        } else {
          body[wireName] = value;
        }
        break;
    }
  }

  const request: UpstreamRequest = { method: tool.method, path, query, headers };
  if (rawBody !== undefined) request.body = rawBody;
  else if (hasBody || (tool.requestBodySchema && tool.method !== 'GET' && tool.method !== 'DELETE')) request.body = body;
  return request;
}

function truncateBody(data: unknown): string {
  const text = typeof data === 'string' ? data : JSON.stringify(data) ?? '';
  return text.length > MAX_ERROR_BODY ? `${text.slice(0, MAX_ERROR_BODY)}...` : text;
}

/**
 * Await the upstream call, but never past the deadline: a client that
 * ignores the abort signal still cannot hold the caller.
 */
async function sendWithDeadline(
  client: UpstreamClient,
  request: UpstreamRequest,
  timeoutMs: number,
  callerSignal?: AbortSignal,
): Promise<UpstreamResponse> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new UpstreamError(`Upstream call timed out after ${timeoutMs}ms`, { kind: 'timeout' }));
    }, timeoutMs);
  });

  const onCallerAbort = () => controller.abort();
  callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

  const cancelled = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => {
      if (callerSignal?.aborted) {
        reject(new UpstreamError('Upstream call cancelled by caller', { kind: 'timeout' }));
      }
    }, { once: true });
  });

  try {
    return await Promise.race([client.send(request, { signal: controller.signal }), deadline, cancelled]);
  } catch (error) {
    if (isScoutError(error)) throw error;
    throw new UpstreamError(`Upstream request failed: ${errorMessage(error)}`, { kind: 'network', cause: error });
  } finally {
    clearTimeout(timer);
    callerSignal?.removeEventListener('abort', onCallerAbort);
  }
}

/**
 * Validate one invocation, send it upstream and return the simplified payload.
 * Failures surface as typed errors; nothing is retried here.
 */
export async function dispatch(
  index: CatalogIndex,
  invocation: Invocation,
  options: DispatcherOptions,
  context: OperationContext = {},
): Promise<DispatchResult> {
  const tool = resolve(index, invocation.toolName);
  const args = validateArguments(tool, invocation.arguments ?? {});
  const request = buildRequest(tool, args);

  if (context.signal?.aborted) {
    throw new UpstreamError('Upstream call cancelled by caller', { kind: 'timeout' });
  }

  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  let response: UpstreamResponse;
  try {
    response = await sendWithDeadline(options.client, request, timeoutMs, context.signal);
  } catch (error) {
    log.warn(`${tool.name} failed`, { method: request.method, path: request.path, error: errorMessage(error) });
    throw error;
  }

  if (response.status < 200 || response.status >= 300) {
    const body = truncateBody(response.data);
    log.warn(`${tool.name} returned ${response.status}`, { method: request.method, path: request.path });
    throw new UpstreamError(`Upstream returned ${response.status} for ${tool.name}`, {
      kind: 'status',
      status: response.status,
      body,
    });
  }

  return {
    toolName: tool.name,
    status: response.status,
    data: simplifyResponse(response.data, tool.tags, options.policy ?? DEFAULT_SIMPLIFICATION_POLICY),
  };
}
