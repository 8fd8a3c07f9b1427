/**
 * @ipscout/dns - DNS transport
 *
 * The single network call a DNS resolver makes: ask one server for the
 * records of one name. The default implementation pins a fresh
 * node:dns Resolver to that server for every query.
 */

import { Resolver as NodeResolver } from 'node:dns/promises';
import { formatSocketAddress, type QueryMethod } from './details.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DnsQuery {
  /** IP address of the server to ask. */
  server: string;
  port: number;
  name: string;
  method: QueryMethod;
}

export interface DnsTransport {
  /**
   * Resolve the records of `query.method` for `query.name`. TXT records are
   * returned with their chunks concatenated. Rejects with a DnsQueryError.
   */
  query(query: DnsQuery, signal?: AbortSignal): Promise<string[]>;
}

export interface NodeDnsTransportOptions {
  /** Per-attempt timeout in milliseconds (default 5 000). */
  timeoutMs?: number;
  /** Attempts per query before giving up (default 1). */
  tries?: number;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** A DNS query failed. `code` is the resolver error code, e.g. ETIMEOUT. */
export class DnsQueryError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = 'DnsQueryError';
  }

  static from(err: unknown): DnsQueryError {
    if (err instanceof DnsQueryError) return err;
    const message = err instanceof Error ? err.message : String(err);
    const code =
      err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : 'EUNKNOWN';
    return new DnsQueryError(message, code);
  }
}

// ---------------------------------------------------------------------------
// NodeDnsTransport
// ---------------------------------------------------------------------------

export class NodeDnsTransport implements DnsTransport {
  private readonly timeoutMs: number;
  private readonly tries: number;

  constructor(options: NodeDnsTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 5_000;
    this.tries = options.tries ?? 1;
  }

  async query(query: DnsQuery, signal?: AbortSignal): Promise<string[]> {
    if (signal?.aborted) {
      throw new DnsQueryError(`query for ${query.name} aborted`, 'ECANCELLED');
    }

    const resolver = new NodeResolver({ timeout: this.timeoutMs, tries: this.tries });
    resolver.setServers([formatSocketAddress(query.server, query.port)]);

    const onAbort = (): void => resolver.cancel();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await lookupRecords(resolver, query);
    } catch (err: unknown) {
      throw DnsQueryError.from(err);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

async function lookupRecords(resolver: NodeResolver, query: DnsQuery): Promise<string[]> {
  switch (query.method) {
    case 'A':
      return resolver.resolve4(query.name);
    case 'AAAA':
      return resolver.resolve6(query.name);
    case 'TXT': {
      const records = await resolver.resolveTxt(query.name);
      return records.map((chunks) => chunks.join(''));
    }
  }
}
