export type ScoutErrorCode =
  | 'SCHEMA_ERROR'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'UPSTREAM_ERROR';

export interface ScoutErrorJSON {
  code: ScoutErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Base class for every failure the catalog reports.
 * `code` is stable and safe to show to an agent; `details` carries the
 * fields an agent needs to correct its next call.
 */
export abstract class ScoutError extends Error {
  abstract readonly code: ScoutErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
  }

  toJSON(): ScoutErrorJSON {
    return {
      code: this.code,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

/** The OpenAPI document could not be parsed or indexed. */
export class SchemaError extends ScoutError {
  readonly code = 'SCHEMA_ERROR';
}

export class NotFoundError extends ScoutError {
  readonly code = 'NOT_FOUND';
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool "${toolName}" not found`, { toolName });
    this.toolName = toolName;
  }
}

export class ValidationError extends ScoutError {
  readonly code = 'VALIDATION_ERROR';
  /** Every argument name that failed, in the order reported */
  readonly fields: string[];

  constructor(message: string, fields: string[], details?: Record<string, unknown>) {
    super(message, { fields, ...details });
    this.fields = fields;
  }
}

export type UpstreamFailureKind = 'network' | 'timeout' | 'status';

export class UpstreamError extends ScoutError {
  readonly code = 'UPSTREAM_ERROR';
  readonly kind: UpstreamFailureKind;
  readonly status?: number;
  /** Response body, truncated */
  readonly body?: string;

  constructor(
    message: string,
    init: { kind: UpstreamFailureKind; status?: number; body?: string; cause?: unknown },
  ) {
    super(
      message,
      {
        kind: init.kind,
        ...(init.status !== undefined ? { status: init.status } : {}),
        ...(init.body !== undefined ? { body: init.body } : {}),
      },
      { cause: init.cause },
    );
    this.kind = init.kind;
    this.status = init.status;
    this.body = init.body;
  }
}

export function isScoutError(error: unknown): error is ScoutError {
  return error instanceof ScoutError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
