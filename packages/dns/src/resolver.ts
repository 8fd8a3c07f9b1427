/**
 * @ipscout/dns - DNS resolver
 *
 * Asks a list of DNS servers, in order, for a name whose answer is the
 * querying host's own address (e.g. myip.opendns.com).
 */

import {
  failed,
  matchesVersion,
  NoAddressError,
  OtherResolveError,
  parseAddress,
  resolved,
  StrategyError,
  type Resolution,
  type ResolveContext,
  type Resolver,
  type Resolutions,
  type Version,
} from '@ipscout/core';
import { fallbackStream } from '@ipscout/fallback';
import { DnsDetails, formatSocketAddress, type QueryMethod } from './details.js';
import { DnsQueryError, type DnsQuery, type DnsTransport } from './transport.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DnsResolverOptions {
  /** Name used in logs (default "dns:<name>/<method>"). */
  label?: string;
  /** DNS name to query. */
  name: string;
  /** IP addresses of the servers to ask, in priority order. */
  servers: readonly string[];
  /** Default 53. */
  port?: number;
  method: QueryMethod;
}

export const DEFAULT_DNS_PORT = 53;

const MAX_NAME_LENGTH = 253;
const LABEL_RE = /^(?!-)[A-Za-z0-9_-]{1,63}(?<!-)$/;

/**
 * Check that `name` is a syntactically valid DNS name (an optional trailing
 * dot is allowed).
 */
export function isValidDnsName(name: string): boolean {
  const trimmed = name.endsWith('.') ? name.slice(0, -1) : name;
  if (trimmed.length === 0 || trimmed.length > MAX_NAME_LENGTH) return false;
  return trimmed.split('.').every((label) => LABEL_RE.test(label));
}

// ---------------------------------------------------------------------------
// DnsResolver
// ---------------------------------------------------------------------------

/**
 * ```ts
 * const resolver = new DnsResolver(
 *   { name: 'myip.opendns.com', servers: ['208.67.222.222'], method: 'A' },
 *   new NodeDnsTransport({ timeoutMs: 2_000 }),
 * );
 * const addr = await bestEffortAddress(resolver, Version.V4);
 * ```
 */
export class DnsResolver implements Resolver {
  public readonly name: string;
  public readonly port: number;

  constructor(
    private readonly options: DnsResolverOptions,
    private readonly transport: DnsTransport,
  ) {
    this.name = options.label ?? `dns:${options.name}/${options.method}`;
    this.port = options.port ?? DEFAULT_DNS_PORT;
  }

  /** The configured servers that can serve `version`, in order. */
  serversFor(version: Version): string[] {
    return this.options.servers.filter((server) => matchesVersion(version, server));
  }

  resolve(version: Version, context: ResolveContext = {}): Resolutions {
    const { name, method } = this.options;

    if (!isValidDnsName(name)) {
      return single(failed(new OtherResolveError(new TypeError(`invalid DNS name "${name}"`))));
    }

    // Servers whose family cannot satisfy the request are never contacted.
    const perServer: Resolver[] = this.serversFor(version).map((server) => {
      const query: DnsQuery = { server, port: this.port, name, method };
      return {
        name: `${this.name}@${formatSocketAddress(server, this.port)}`,
        resolve: (_version: Version, ctx: ResolveContext = {}) =>
          queryServer(this.transport, query, ctx.signal),
      };
    });

    return fallbackStream(perServer, version, context);
  }
}

// ---------------------------------------------------------------------------
// Per-server query
// ---------------------------------------------------------------------------

async function* single(item: Resolution): AsyncGenerator<Resolution, void, undefined> {
  yield item;
}

async function* queryServer(
  transport: DnsTransport,
  query: DnsQuery,
  signal: AbortSignal | undefined,
): AsyncGenerator<Resolution, void, undefined> {
  let answers: string[];
  try {
    answers = await transport.query(query, signal);
  } catch (err: unknown) {
    const error = DnsQueryError.from(err);
    yield failed(
      error.code === 'ENODATA' ? new NoAddressError() : new StrategyError('dns', error),
    );
    return;
  }
  yield parseAnswer(answers, query);
}

/**
 * Turn the records of one answer into a resolution. Only the first record
 * is considered.
 */
export function parseAnswer(answers: readonly string[], query: DnsQuery): Resolution {
  const first = answers[0];
  if (first === undefined) {
    return failed(new NoAddressError());
  }

  const address = parseAddress(first);
  if (address === undefined) {
    return failed(new NoAddressError(first));
  }

  const expected = query.method === 'A' ? 'v4' : query.method === 'AAAA' ? 'v6' : 'any';
  if (!matchesVersion(expected, address)) {
    return failed(
      new StrategyError(
        'dns',
        new DnsQueryError(`${query.method} answer contained ${address}`, 'EBADRESP'),
      ),
    );
  }

  return resolved(
    address,
    new DnsDetails({ server: query.server, port: query.port, name: query.name, method: query.method }),
  );
}
