/**
 * Request building and response unwrapping shared by every operation.
 *
 * @module http/request
 */

import type { z } from 'zod';
import { DecodeError, RequestFailedError } from '../errors.js';
import type { Logger } from '../observability/logging.js';
import type { HttpMethod, Transport } from './transport.js';

/**
 * Joins the base URL and an absolute API path. Trailing slashes on the base
 * are dropped so `http://h:6333/` and `http://h:6333` compose the same URL.
 */
export function buildUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${path}`;
}

/**
 * Percent-encodes one path segment (collection name, textual point id).
 */
export function segment(value: string | number): string {
  return encodeURIComponent(typeof value === 'number' ? value.toString(10) : value);
}

/**
 * A completed HTTP exchange with its body parsed as JSON.
 */
export interface ApiResponse {
  status: number;
  ok: boolean;
  /** Parsed JSON body; undefined when the body was empty. */
  body: unknown;
}

/**
 * Options for a single API call.
 */
export interface ApiCallOptions {
  /** Operation name used in logs and error messages. */
  operation: string;
  body?: unknown;
  signal?: AbortSignal;
}

export interface HttpClientOptions {
  baseUrl: string;
  apiKey?: string;
  transport: Transport;
  logger: Logger;
}

/**
 * Issues one JSON request per call against a fixed base URL.
 *
 * Holds no per-call state; the credential is fixed at construction.
 */
export class HttpClient {
  readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly transport: Transport;
  private readonly logger: Logger;

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl;
    this.apiKey = options.apiKey;
    this.transport = options.transport;
    this.logger = options.logger;
  }

  hasApiKey(): boolean {
    return this.apiKey !== undefined;
  }

  /**
   * Headers sent on every request.
   */
  buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };

    // never log this
    if (this.apiKey !== undefined) {
      headers['api-key'] = this.apiKey;
    }

    return headers;
  }

  /**
   * Sends one request and parses the response body.
   *
   * Resolves for any HTTP status. Rejects with TransportError when the
   * exchange does not complete, and with DecodeError when a 2xx body is not
   * JSON.
   */
  async call(method: HttpMethod, path: string, options: ApiCallOptions): Promise<ApiResponse> {
    const url = buildUrl(this.baseUrl, path);

    this.logger.debug('Sending request', { operation: options.operation, method, path });

    const response = await this.transport.send({
      method,
      url,
      headers: this.buildHeaders(),
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
      signal: options.signal,
    });

    const ok = response.status >= 200 && response.status < 300;

    this.logger.debug('Received response', {
      operation: options.operation,
      method,
      path,
      status: response.status,
    });

    return {
      status: response.status,
      ok,
      body: parseBody(response.body, ok, options.operation),
    };
  }

  /**
   * Like {@link call}, but a non-2xx status rejects with RequestFailedError.
   * Resolves with the parsed body.
   */
  async send(method: HttpMethod, path: string, options: ApiCallOptions): Promise<unknown> {
    const response = await this.call(method, path, options);
    if (!response.ok) {
      throw RequestFailedError.fromResponse(response.status, response.body, options.operation);
    }
    return response.body;
  }
}

function parseBody(text: string, ok: boolean, operation: string): unknown {
  if (text.trim() === '') {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    // error bodies are often plain text; the status alone describes the failure
    if (!ok) {
      return undefined;
    }
    throw new DecodeError(`${operation}: response body is not valid JSON`, { operation }, error);
  }
}

/**
 * Validates a parsed body against an envelope schema.
 * @throws {DecodeError} Naming the first missing or mistyped field.
 */
export function decodeEnvelope<S extends z.ZodTypeAny>(
  schema: S,
  body: unknown,
  operation: string
): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new DecodeError(
      `${operation}: unexpected response at '${field}': ${issue?.message ?? 'invalid value'}`,
      { operation, field }
    );
  }
  return result.data;
}
