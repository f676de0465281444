import { describe, it, expect } from 'vitest';
import {
  NotFoundError,
  SchemaError,
  UpstreamError,
  ValidationError,
  errorMessage,
  isScoutError,
} from '../src/errors.js';

describe('errors', () => {
  it('carry a stable code and their class name', () => {
    const error = new NotFoundError('reboot_server');
    expect(error.code).toBe('NOT_FOUND');
    expect(error.name).toBe('NotFoundError');
    expect(error.toolName).toBe('reboot_server');
    expect(error.toJSON()).toEqual({
      code: 'NOT_FOUND',
      message: 'Tool "reboot_server" not found',
      details: { toolName: 'reboot_server' },
    });
  });

  it('include failing fields in validation errors', () => {
    const error = new ValidationError('bad', ['term'], { missing: ['term'] });
    expect(error.toJSON()).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'bad',
      details: { fields: ['term'], missing: ['term'] },
    });
  });

  it('describe upstream failures without the cause', () => {
    const cause = new Error('socket hang up');
    const error = new UpstreamError('Upstream request failed: socket hang up', { kind: 'network', cause });
    expect(error.cause).toBe(cause);
    expect(error.toJSON()).toEqual({
      code: 'UPSTREAM_ERROR',
      message: 'Upstream request failed: socket hang up',
      details: { kind: 'network' },
    });
  });

  it('omit details when there are none', () => {
    expect(new SchemaError('Document has no paths').toJSON()).toEqual({
      code: 'SCHEMA_ERROR',
      message: 'Document has no paths',
    });
  });

  it('are told apart from other errors', () => {
    expect(isScoutError(new SchemaError('x'))).toBe(true);
    expect(isScoutError(new Error('x'))).toBe(false);
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
