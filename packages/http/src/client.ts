/**
 * @ipscout/http - HTTP client
 *
 * The network calls an HTTP resolver makes: look up an origin's addresses,
 * then GET the URI from one specific address. The default client is built on
 * undici; each host name gets its own Agent so the TLS server name stays
 * correct while the connection is pinned to a chosen address.
 */

import { lookup as dnsLookup } from 'node:dns/promises';
import { Agent, request } from 'undici';
import type { AddressFamily } from '@ipscout/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LookupResult {
  address: string;
  family: AddressFamily;
}

export interface HttpGetRequest {
  url: URL;
  /** IP address to connect to instead of resolving `url.hostname`. */
  address: string;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface HttpResponse {
  statusCode: number;
  body: string;
}

export interface HttpClient {
  lookup(hostname: string): Promise<LookupResult[]>;
  get(request: HttpGetRequest): Promise<HttpResponse>;
  /** Release pooled connections. The client cannot be used afterwards. */
  close(): Promise<void>;
}

export interface HttpClientOptions {
  /** Connect, headers and body timeout in milliseconds (default 5 000). */
  timeoutMs?: number;
  userAgent?: string;
  /** Idle keep-alive in milliseconds (default 4 000). */
  keepAliveTimeout?: number;
}

export const DEFAULT_USER_AGENT = 'ipscout';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * Error that carries an HTTP status code. Network failures (refused
 * connection, timeout, failed lookup) use status 0.
 */
export class HttpError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = 'HttpError';
  }

  static from(err: unknown): HttpError {
    if (err instanceof HttpError) return err;
    const error = new HttpError(err instanceof Error ? err.message : String(err), 0);
    error.cause = err;
    return error;
  }
}

// ---------------------------------------------------------------------------
// Undici client
// ---------------------------------------------------------------------------

/**
 * ```ts
 * const client = createHttpClient({ timeoutMs: 3_000 });
 * try {
 *   const addr = await bestEffortAddress(createHttpProviders(client), Version.Any);
 * } finally {
 *   await client.close();
 * }
 * ```
 */
export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
  return new UndiciHttpClient(options);
}

class UndiciHttpClient implements HttpClient {
  private readonly agents = new Map<string, Agent>();
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly keepAliveTimeout: number;
  private closed = false;

  constructor(options: HttpClientOptions) {
    this.timeoutMs = options.timeoutMs ?? 5_000;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.keepAliveTimeout = options.keepAliveTimeout ?? 4_000;
  }

  async lookup(hostname: string): Promise<LookupResult[]> {
    const results = await dnsLookup(hostname, { all: true });
    return results.flatMap((entry): LookupResult[] =>
      entry.family === 4 || entry.family === 6
        ? [{ address: entry.address, family: entry.family }]
        : [],
    );
  }

  async get(req: HttpGetRequest): Promise<HttpResponse> {
    if (this.closed) {
      throw new HttpError('HTTP client is closed', 0);
    }

    const target = new URL(req.url.href);
    target.hostname = req.address.includes(':') ? `[${req.address}]` : req.address;

    const response = await request(target, {
      method: 'GET',
      dispatcher: this.agentFor(req.url.hostname),
      headers: {
        accept: '*/*',
        'user-agent': this.userAgent,
        ...req.headers,
        host: req.url.host,
      },
      signal: req.signal,
      headersTimeout: this.timeoutMs,
      bodyTimeout: this.timeoutMs,
    });

    const body = await response.body.text();
    return { statusCode: response.statusCode, body };
  }

  async close(): Promise<void> {
    this.closed = true;
    const agents = [...this.agents.values()];
    this.agents.clear();
    await Promise.all(agents.map((agent) => agent.close()));
  }

  private agentFor(hostname: string): Agent {
    let agent = this.agents.get(hostname);
    if (!agent) {
      const isLiteral = hostname.startsWith('[') || /^[\d.]+$/.test(hostname);
      agent = new Agent({
        keepAliveTimeout: this.keepAliveTimeout,
        connect: {
          timeout: this.timeoutMs,
          ...(isLiteral ? {} : { servername: hostname }),
        },
      });
      this.agents.set(hostname, agent);
    }
    return agent;
  }
}
