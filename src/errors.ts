/**
 * Error taxonomy shared by the transport, protocol and execution layers.
 *
 * Every failure that crosses a component boundary is a RelayError carrying a
 * `kind` so callers can branch without string matching.
 */

export type RelayErrorKind =
  | 'TransportUnavailable'
  | 'ProtocolFraming'
  | 'Timeout'
  | 'ServerUnavailable'
  | 'UnknownTool'
  | 'SchemaValidation'
  | 'PermissionDenied'
  | 'Cancelled'
  | 'ModelCallFailure'
  | 'ToolExecution'
  | 'Configuration';

export interface RelayErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class RelayError extends Error {
  readonly kind: RelayErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: RelayErrorKind, message: string, options: RelayErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'RelayError';
    this.kind = kind;
    this.details = options.details;
  }
}

export class TransportUnavailableError extends RelayError {
  constructor(message: string, options?: RelayErrorOptions) {
    super('TransportUnavailable', message, options);
    this.name = 'TransportUnavailableError';
  }
}

export class ProtocolFramingError extends RelayError {
  /** The raw frame that failed to parse, truncated */
  readonly frame?: string;

  constructor(message: string, frame?: string, options?: RelayErrorOptions) {
    super('ProtocolFraming', message, options);
    this.name = 'ProtocolFramingError';
    this.frame = frame?.slice(0, 200);
  }
}

export class TimeoutError extends RelayError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, options?: RelayErrorOptions) {
    super('Timeout', message, options);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ServerUnavailableError extends RelayError {
  constructor(message: string, options?: RelayErrorOptions) {
    super('ServerUnavailable', message, options);
    this.name = 'ServerUnavailableError';
  }
}

export class UnknownToolError extends RelayError {
  readonly toolName: string;

  constructor(toolName: string) {
    super('UnknownTool', `Unknown tool: ${toolName}`);
    this.name = 'UnknownToolError';
    this.toolName = toolName;
  }
}

export class SchemaValidationError extends RelayError {
  readonly errors: string[];

  constructor(toolName: string, errors: string[]) {
    super('SchemaValidation', `Invalid arguments for ${toolName}: ${errors.join('; ')}`);
    this.name = 'SchemaValidationError';
    this.errors = errors;
  }
}

export class CancelledError extends RelayError {
  constructor(message = 'Operation cancelled', options?: RelayErrorOptions) {
    super('Cancelled', message, options);
    this.name = 'CancelledError';
  }
}

export class ConfigurationError extends RelayError {
  constructor(message: string, options?: RelayErrorOptions) {
    super('Configuration', message, options);
    this.name = 'ConfigurationError';
  }
}

export function isRelayError(err: unknown): err is RelayError {
  return err instanceof RelayError;
}

/**
 * Normalize any thrown value into a RelayError. Values that are already
 * tagged keep their kind; anything else becomes `fallbackKind`.
 */
export function toRelayError(err: unknown, fallbackKind: RelayErrorKind = 'ToolExecution'): RelayError {
  if (err instanceof RelayError) return err;
  if (err instanceof Error) {
    if (err.name === 'AbortError') {
      return new CancelledError(err.message || 'Operation aborted', { cause: err });
    }
    return new RelayError(fallbackKind, err.message, { cause: err });
  }
  return new RelayError(fallbackKind, String(err));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
