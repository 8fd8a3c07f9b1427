/**
 * In-process stand-ins for the DNS transport and the HTTP client, plus
 * small resolver builders shared by the unit tests.
 */
import { pino } from 'pino';
import {
  CustomDetails,
  failed,
  resolved,
  type Logger,
  type Resolution,
  type AnyResolveError,
  type Resolutions,
  type Resolver,
  type Version,
} from '@ipscout/core';
import type { DnsQuery, DnsTransport } from '@ipscout/dns';
import { DnsQueryError } from '@ipscout/dns';
import type { HttpClient, HttpGetRequest, HttpResponse, LookupResult } from '@ipscout/http';

export const silentLogger: Logger = pino({ level: 'silent' });

// ---------------------------------------------------------------------------
// Streams
// ---------------------------------------------------------------------------

export async function collect<T>(stream: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of stream) items.push(item);
  return items;
}

/** Addresses of successes and messages of errors, in stream order. */
export function summarize(items: readonly Resolution[]): string[] {
  return items.map((item) => (item.ok ? item.address : `error:${item.error.kind}`));
}

export function ok(address: string, source = 'test'): Resolution {
  return resolved(address, new CustomDetails('custom', source));
}

export function err(error: AnyResolveError): Resolution {
  return failed(error);
}

/**
 * A resolver that yields `items` and records when it was started and how
 * far it was pulled.
 */
export class ScriptedResolver implements Resolver {
  started = 0;
  pulled = 0;
  finished = false;
  versions: Version[] = [];

  constructor(
    public readonly name: string,
    private readonly items: readonly Resolution[],
  ) {}

  resolve(version: Version): Resolutions {
    this.started++;
    this.versions.push(version);
    const self = this;
    return (async function* () {
      try {
        for (const item of self.items) {
          self.pulled++;
          yield item;
        }
      } finally {
        self.finished = true;
      }
    })();
  }
}

// ---------------------------------------------------------------------------
// DNS
// ---------------------------------------------------------------------------

type DnsAnswer = string[] | DnsQueryError;

/** Answers keyed by server address; unknown servers time out. */
export class FakeDnsTransport implements DnsTransport {
  readonly queries: DnsQuery[] = [];

  constructor(private readonly answers: Record<string, DnsAnswer> = {}) {}

  async query(query: DnsQuery): Promise<string[]> {
    this.queries.push(query);
    const answer = this.answers[query.server];
    if (answer === undefined) {
      throw new DnsQueryError(`queryA ETIMEOUT ${query.name}`, 'ETIMEOUT');
    }
    if (answer instanceof DnsQueryError) throw answer;
    return answer;
  }
}

// ---------------------------------------------------------------------------
// HTTP
// ---------------------------------------------------------------------------

type HttpAnswer = HttpResponse | Error;

/**
 * Host lookups come from `hosts`; responses are keyed by the pinned server
 * address. Unknown servers refuse the connection.
 */
export class FakeHttpClient implements HttpClient {
  readonly lookups: string[] = [];
  readonly requests: HttpGetRequest[] = [];
  closed = 0;

  constructor(
    private readonly hosts: Record<string, string[]> = {},
    private readonly responses: Record<string, HttpAnswer> = {},
  ) {}

  async lookup(hostname: string): Promise<LookupResult[]> {
    this.lookups.push(hostname);
    const addresses = this.hosts[hostname];
    if (addresses === undefined) {
      throw new Error(`getaddrinfo ENOTFOUND ${hostname}`);
    }
    return addresses.map(
      (address): LookupResult => ({ address, family: address.includes(':') ? 6 : 4 }),
    );
  }

  async get(request: HttpGetRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const answer = this.responses[request.address];
    if (answer === undefined) {
      throw new Error(`connect ECONNREFUSED ${request.address}`);
    }
    if (answer instanceof Error) throw answer;
    return answer;
  }

  async close(): Promise<void> {
    this.closed++;
  }
}
