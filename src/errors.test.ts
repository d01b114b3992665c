import { describe, it, expect } from 'vitest';
import {
  CancelledError,
  ProtocolFramingError,
  RelayError,
  SchemaValidationError,
  TimeoutError,
  UnknownToolError,
  errorMessage,
  isRelayError,
  toRelayError,
} from './errors';

describe('RelayError subclasses', () => {
  it('tag each failure with its kind', () => {
    expect(new UnknownToolError('grep').kind).toBe('UnknownTool');
    expect(new UnknownToolError('grep').message).toBe('Unknown tool: grep');
    expect(new TimeoutError('slow', 500).kind).toBe('Timeout');
    expect(new TimeoutError('slow', 500).timeoutMs).toBe(500);
    expect(new CancelledError().message).toBe('Operation cancelled');
  });

  it('joins schema errors into the message', () => {
    const err = new SchemaValidationError('read_file', ['$.path: required field missing', '$.limit: must be >= 1']);
    expect(err.message).toBe('Invalid arguments for read_file: $.path: required field missing; $.limit: must be >= 1');
    expect(err.errors).toHaveLength(2);
  });

  it('truncates the offending frame to 200 characters', () => {
    const err = new ProtocolFramingError('bad frame', 'x'.repeat(500));
    expect(err.frame).toHaveLength(200);
    expect(err.kind).toBe('ProtocolFraming');
  });
});

describe('toRelayError', () => {
  it('keeps an existing RelayError untouched', () => {
    const original = new TimeoutError('slow', 10);
    expect(toRelayError(original)).toBe(original);
  });

  it('maps AbortError to Cancelled', () => {
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';
    const converted = toRelayError(abort);
    expect(converted).toBeInstanceOf(CancelledError);
    expect(converted.message).toBe('The operation was aborted');
  });

  it('wraps plain errors with the fallback kind and keeps the cause', () => {
    const cause = new Error('boom');
    const converted = toRelayError(cause, 'ModelCallFailure');
    expect(converted.kind).toBe('ModelCallFailure');
    expect(converted.message).toBe('boom');
    expect(converted.cause).toBe(cause);
  });

  it('stringifies non-error values', () => {
    const converted = toRelayError(42);
    expect(converted.kind).toBe('ToolExecution');
    expect(converted.message).toBe('42');
  });
});

describe('helpers', () => {
  it('isRelayError narrows only RelayError instances', () => {
    expect(isRelayError(new RelayError('Configuration', 'x'))).toBe(true);
    expect(isRelayError(new Error('x'))).toBe(false);
  });

  it('errorMessage reads Error messages and stringifies the rest', () => {
    expect(errorMessage(new Error('nope'))).toBe('nope');
    expect(errorMessage('plain')).toBe('plain');
  });
});
