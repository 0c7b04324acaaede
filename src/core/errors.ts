/**
 * Error Hierarchy for the NAV service client
 *
 * All errors are immutable and provide structured error information.
 * Transport failures and protocol/data failures are kept apart so callers can
 * tell an unreachable server from a server that answered with a fault.
 */

// ============================================================================
// Base Error Class
// ============================================================================

export interface NavErrorOptions {
  readonly context?: Record<string, unknown>;
  readonly cause?: unknown;
}

export abstract class NavError extends Error {
  public readonly name: string;
  public readonly code: string;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  protected constructor(message: string, code: string, options: NavErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.timestamp = new Date();
    this.context = options.context;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    Object.setPrototypeOf(this, new.target.prototype);
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  public toString(): string {
    const contextStr = this.context
      ? ` | Context: ${JSON.stringify(this.context)}`
      : '';
    return `[${this.code}] ${this.name}: ${this.message}${contextStr}`;
  }
}

// ============================================================================
// Transport Errors
// ============================================================================

export class NetworkError extends NavError {
  public constructor(message: string, options: NavErrorOptions = {}) {
    super(message, 'NAV_NETWORK_ERROR', {
      ...options,
      context: { ...options.context, subtype: 'network' },
    });
  }
}

export class TimeoutError extends NavError {
  public readonly timeoutMs: number;

  public constructor(message: string, timeoutMs: number, options: NavErrorOptions = {}) {
    super(message, 'NAV_TIMEOUT_ERROR', {
      ...options,
      context: { ...options.context, timeoutMs, subtype: 'timeout' },
    });
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Non-success HTTP status on a SOAP call. Carries the fault text when the
 * body held one, otherwise the raw body.
 */
export class SoapHttpError extends NavError {
  public readonly statusCode: number;
  public readonly fault?: string;

  public constructor(statusCode: number, fault: string | undefined, body: string) {
    super(`SOAP Error: HTTP ${statusCode} - ${fault ?? body}`, 'NAV_SOAP_HTTP_ERROR', {
      context: { statusCode, fault },
    });
    this.statusCode = statusCode;
    this.fault = fault;
  }
}

export class ODataHttpError extends NavError {
  public readonly statusCode: number;
  public readonly body: string;

  public constructor(statusCode: number, statusText: string, body: string, context?: Record<string, unknown>) {
    super(
      `OData Error: HTTP ${statusCode}${statusText ? ` ${statusText}` : ''}`,
      'NAV_ODATA_HTTP_ERROR',
      { context: { ...context, statusCode } }
    );
    this.statusCode = statusCode;
    this.body = body;
  }
}

// ============================================================================
// Protocol / Data Errors
// ============================================================================

/**
 * SOAP fault markers found in a response that arrived with a success status.
 */
export class SoapFaultError extends NavError {
  public readonly fault?: string;

  public constructor(fault: string | undefined, context?: Record<string, unknown>) {
    super(`SOAP Fault: ${fault ?? 'unknown fault'}`, 'NAV_SOAP_FAULT', {
      context: { ...context, fault },
    });
    this.fault = fault;
  }
}

export class InvalidResponseError extends NavError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NAV_INVALID_RESPONSE', { context: { ...context, subtype: 'invalid_response' } });
  }
}

export class ParseError extends NavError {
  public constructor(message: string, options: NavErrorOptions = {}) {
    super(message, 'NAV_PARSE_ERROR', options);
  }
}

export class EntityNotFoundError extends NavError {
  public readonly service: string;
  public readonly filter: string;

  public constructor(service: string, filter: string, message?: string) {
    super(
      message ?? `No entity found in '${service}' matching filter: ${filter}`,
      'NAV_ENTITY_NOT_FOUND',
      { context: { service, filter } }
    );
    this.service = service;
    this.filter = filter;
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigValidationError extends NavError {
  public readonly field?: string;

  public constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'NAV_CONFIG_VALIDATION_ERROR', {
      context: { ...context, field, subtype: 'config' },
    });
    this.field = field;
  }
}

// ============================================================================
// Error Type Guards
// ============================================================================

export type TransportError = NetworkError | TimeoutError | SoapHttpError | ODataHttpError;

export type ProtocolError = SoapFaultError | InvalidResponseError | ParseError | EntityNotFoundError;

export function isNavError(error: unknown): error is NavError {
  return error instanceof NavError;
}

export function isTransportError(error: unknown): error is TransportError {
  return (
    error instanceof NetworkError ||
    error instanceof TimeoutError ||
    error instanceof SoapHttpError ||
    error instanceof ODataHttpError
  );
}

export function isProtocolError(error: unknown): error is ProtocolError {
  return (
    error instanceof SoapFaultError ||
    error instanceof InvalidResponseError ||
    error instanceof ParseError ||
    error instanceof EntityNotFoundError
  );
}

/**
 * Human-readable message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
