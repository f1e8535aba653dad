/**
 * Transport layer abstraction for HTTP communication.
 *
 * The default implementation uses the Fetch API built into Node.js. Tests and
 * embedders can supply any other {@link Transport}, such as the in-memory
 * server in `testing/mock.ts`.
 *
 * @module http/transport
 */

import { CancelledError, TransportError } from '../errors.js';

/**
 * HTTP methods used by the Qdrant REST API.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * A fully built HTTP request.
 */
export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

/**
 * A raw HTTP response. Header names are lower-cased.
 */
export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Transport interface for HTTP communication.
 *
 * Implementations must reject with {@link TransportError} when the exchange
 * cannot complete and with {@link CancelledError} when the request's signal
 * aborts it. Any status code is a completed exchange and must resolve.
 */
export interface Transport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * The subset of the Fetch API the transport relies on.
 */
export type FetchFunction = (
  url: string,
  init: {
    method: string;
    headers: Record<string, string>;
    body?: string;
    signal?: AbortSignal;
  }
) => Promise<{
  status: number;
  headers: { forEach(callback: (value: string, key: string) => void): void };
  text(): Promise<string>;
}>;

/**
 * Fetch transport options.
 */
export interface FetchTransportOptions {
  /** Fetch implementation; defaults to the global `fetch`. */
  fetch?: FetchFunction;
}

/**
 * Fetch-based HTTP transport implementation.
 *
 * Connection pooling, keep-alive and TLS are left to the runtime's fetch.
 * No timeout is applied; callers cancel through `signal`.
 */
export class FetchTransport implements Transport {
  private readonly fetchFn: FetchFunction;

  constructor(options: FetchTransportOptions = {}) {
    this.fetchFn = options.fetch ?? fetch;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    if (request.signal?.aborted) {
      throw new CancelledError({ url: request.url });
    }

    try {
      const response = await this.fetchFn(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: request.signal,
      });

      const body = await response.text();

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        headers,
        body,
      };
    } catch (error) {
      if (request.signal?.aborted || (error instanceof Error && error.name === 'AbortError')) {
        throw new CancelledError({ url: request.url });
      }

      const reason = error instanceof Error ? describeFetchFailure(error) : String(error);
      throw new TransportError(`Network request failed: ${reason}`, error, {
        url: request.url,
      });
    }
  }
}

/**
 * Node's fetch reports "fetch failed" and keeps the useful part
 * (ECONNREFUSED, ENOTFOUND, ...) in `cause`.
 */
function describeFetchFailure(error: Error): string {
  const cause = error.cause;
  if (cause instanceof Error && cause.message) {
    return `${error.message} (${cause.message})`;
  }
  return error.message;
}
