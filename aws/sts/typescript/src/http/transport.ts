/**
 * Transport layer abstraction for HTTP communication.
 *
 * The default implementation keeps one undici `Pool` per origin.
 *
 * @module http/transport
 */

import { Pool } from 'undici';

/**
 * HTTP request
 */
export interface HttpRequest {
  /** HTTP method */
  method: 'GET' | 'POST';
  /** Absolute request URL */
  url: string;
  /** Request headers */
  headers: Record<string, string>;
  /** Request body */
  body?: string;
}

/**
 * HTTP response
 */
export interface HttpResponse {
  /** HTTP status code */
  status: number;
  /** Response headers, lower-case names */
  headers: Record<string, string>;
  /** Response body */
  body: string;
}

/**
 * Transport interface for HTTP communication.
 *
 * @example
 * ```typescript
 * class CustomTransport implements HttpTransport {
 *   async send(request: HttpRequest): Promise<HttpResponse> {
 *     return { status: 200, headers: {}, body: '' };
 *   }
 * }
 * ```
 */
export interface HttpTransport {
  /**
   * Send an HTTP request and return the response.
   *
   * @throws Error if the request cannot be sent or times out
   */
  send(request: HttpRequest): Promise<HttpResponse>;

  /**
   * Release pooled connections.
   */
  close?(): Promise<void>;
}

/**
 * Pooled transport options.
 */
export interface PooledTransportOptions {
  /** Header and body timeout in milliseconds */
  timeout?: number;
  /** Verify TLS certificates */
  validateCerts?: boolean;
  /** Maximum connections per origin */
  connections?: number;
}

const DEFAULT_TRANSPORT_OPTIONS: Required<PooledTransportOptions> = {
  timeout: 30000,
  validateCerts: true,
  connections: 4,
};

/**
 * undici-backed transport.
 *
 * @example
 * ```typescript
 * const transport = new PooledTransport({ timeout: 10000 });
 * try {
 *   const response = await transport.send({
 *     method: 'POST',
 *     url: 'https://sts.us-east-1.amazonaws.com/',
 *     headers: { 'content-type': 'application/x-www-form-urlencoded' },
 *     body: 'Action=GetCallerIdentity&Version=2011-06-15',
 *   });
 * } finally {
 *   await transport.close();
 * }
 * ```
 */
export class PooledTransport implements HttpTransport {
  private readonly options: Required<PooledTransportOptions>;
  private readonly pools = new Map<string, Pool>();
  private closed = false;

  constructor(options?: PooledTransportOptions) {
    this.options = {
      ...DEFAULT_TRANSPORT_OPTIONS,
      ...options,
    };
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    if (this.closed) {
      throw new Error('Transport is closed');
    }

    const url = new URL(request.url);
    const pool = this.poolFor(url.origin);

    const response = await pool.request({
      method: request.method,
      path: `${url.pathname}${url.search}`,
      headers: request.headers,
      body: request.body,
      headersTimeout: this.options.timeout,
      bodyTimeout: this.options.timeout,
    });

    const body = await response.body.text();

    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(response.headers)) {
      if (typeof value === 'string') {
        headers[key.toLowerCase()] = value;
      } else if (Array.isArray(value)) {
        headers[key.toLowerCase()] = value.join(', ');
      }
    }

    return {
      status: response.statusCode,
      headers,
      body,
    };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const pools = Array.from(this.pools.values());
    this.pools.clear();
    await Promise.all(pools.map((pool) => pool.close()));
  }

  private poolFor(origin: string): Pool {
    let pool = this.pools.get(origin);
    if (!pool) {
      pool = new Pool(origin, {
        connections: this.options.connections,
        pipelining: 1,
        connect: { rejectUnauthorized: this.options.validateCerts },
      });
      this.pools.set(origin, pool);
    }
    return pool;
  }
}

/**
 * Create a default transport instance.
 */
export function createDefaultTransport(options?: PooledTransportOptions): HttpTransport {
  return new PooledTransport(options);
}
