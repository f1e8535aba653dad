/**
 * Error handling for the Qdrant REST client.
 *
 * Every failure surfaced by the client is a {@link QdrantError}. Transport,
 * HTTP and JSON failures are normalized into the subclasses below so callers
 * can branch on `instanceof` or on the `type` field.
 *
 * @module errors
 */

/**
 * Discriminator carried by every {@link QdrantError}.
 */
export type QdrantErrorType =
  | 'transport_error'
  | 'cancelled'
  | 'request_failed'
  | 'decode_error'
  | 'conflict'
  | 'not_found'
  | 'validation_error'
  | 'configuration_error';

/**
 * Base error class for all client errors.
 */
export class QdrantError extends Error {
  /**
   * The type of error (e.g., 'request_failed', 'decode_error')
   */
  public readonly type: QdrantErrorType;

  /**
   * HTTP status code associated with the error, if applicable
   */
  public readonly status?: number;

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>;

  constructor(options: {
    type: QdrantErrorType;
    message: string;
    status?: number;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'QdrantError';
    this.type = options.type;
    this.status = options.status;
    this.details = options.details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      status: this.status,
      details: this.details,
    };
  }
}

// ============================================================================
// Transport Errors
// ============================================================================

/**
 * The HTTP call itself could not be completed (DNS, connect, TLS, reset).
 * Never retried by the client.
 */
export class TransportError extends QdrantError {
  constructor(
    message: string,
    cause?: unknown,
    details?: Record<string, unknown>,
    type: 'transport_error' | 'cancelled' = 'transport_error'
  ) {
    super({
      type,
      message,
      details: { ...details, cause: cause instanceof Error ? cause.message : undefined },
      cause,
    });
    this.name = 'TransportError';
  }
}

/**
 * The caller aborted the in-flight request through its AbortSignal.
 */
export class CancelledError extends TransportError {
  constructor(details?: Record<string, unknown>) {
    super('Request was cancelled', undefined, details, 'cancelled');
    this.name = 'CancelledError';
  }
}

// ============================================================================
// Response Errors
// ============================================================================

/**
 * The call completed but the server reported failure, either through a
 * non-2xx HTTP status or through the envelope's status / result fields.
 */
export class RequestFailedError extends QdrantError {
  /**
   * Status string or error message reported by the server, if any.
   */
  public readonly serverStatus?: string;

  constructor(
    message: string,
    options: { status?: number; serverStatus?: string; details?: Record<string, unknown> } = {}
  ) {
    super({
      type: 'request_failed',
      message,
      status: options.status,
      details: options.details,
    });
    this.name = 'RequestFailedError';
    this.serverStatus = options.serverStatus;
  }

  /**
   * Builds an error from a non-2xx response.
   * @param status - HTTP status code.
   * @param body - Parsed response body, if it was JSON.
   * @param operation - Client operation that issued the request.
   */
  static fromResponse(status: number, body: unknown, operation: string): RequestFailedError {
    const serverStatus = extractServerStatus(body);
    const message = serverStatus
      ? `${operation} failed with HTTP ${status}: ${serverStatus}`
      : `${operation} failed with HTTP ${status}`;
    return new RequestFailedError(message, {
      status,
      serverStatus,
      details: { operation },
    });
  }
}

/**
 * The response body was not valid JSON or lacked a field the operation needs.
 */
export class DecodeError extends QdrantError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super({
      type: 'decode_error',
      message,
      details,
      cause,
    });
    this.name = 'DecodeError';
  }
}

// ============================================================================
// Client-enforced Preconditions
// ============================================================================

/**
 * Create was called for a collection that already exists.
 * Raised by the client before any create request, so `status` is unset.
 */
export class ConflictError extends QdrantError {
  constructor(collectionName: string) {
    super({
      type: 'conflict',
      message: `Collection '${collectionName}' already exists`,
      details: { collectionName },
    });
    this.name = 'ConflictError';
  }
}

/**
 * Delete was called for a collection that does not exist.
 * Raised by the client before any delete request, so `status` is unset.
 */
export class NotFoundError extends QdrantError {
  constructor(collectionName: string) {
    super({
      type: 'not_found',
      message: `Collection '${collectionName}' not found`,
      details: { collectionName },
    });
    this.name = 'NotFoundError';
  }
}

/**
 * A caller-supplied argument was rejected before any request was sent.
 */
export class ValidationError extends QdrantError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      type: 'validation_error',
      message,
      details,
    });
    this.name = 'ValidationError';
  }
}

/**
 * The client configuration is invalid.
 */
export class ConfigurationError extends QdrantError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      type: 'configuration_error',
      message,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Pulls a human-readable status out of a Qdrant response envelope.
 * Qdrant reports failures as `{ status: { error: "..." } }` and
 * successes as `{ status: "ok" }`.
 */
export function extractServerStatus(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('status' in body)) {
    return undefined;
  }
  const status = body.status;
  if (typeof status === 'string') {
    return status;
  }
  if (typeof status === 'object' && status !== null && 'error' in status) {
    return typeof status.error === 'string' ? status.error : undefined;
  }
  return undefined;
}

/**
 * Type guard to check if an error is a QdrantError.
 */
export function isQdrantError(error: unknown): error is QdrantError {
  return error instanceof QdrantError;
}

/**
 * Type guard for failures where the HTTP call never completed.
 */
export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}
