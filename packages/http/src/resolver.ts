/**
 * @ipscout/http - HTTP resolver
 *
 * GETs a URI whose response body is the caller's address. The origin's
 * addresses are looked up first and filtered by the requested version; each
 * remaining address is then tried in turn.
 */

import {
  addressFamily,
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
import { HttpError, type HttpClient, type HttpResponse } from './client.js';
import { HttpDetails, type ExtractMethod } from './details.js';
import { extractCandidate } from './extract.js';

export interface HttpResolverOptions {
  /** Name used in logs (default "http:<uri>"). */
  label?: string;
  uri: string;
  /** Default "plain-text". */
  method?: ExtractMethod;
  /** Extra request headers. */
  headers?: Record<string, string>;
}

/**
 * ```ts
 * const ipify = new HttpResolver({ uri: 'http://api.ipify.org' }, client);
 * ```
 */
export class HttpResolver implements Resolver {
  public readonly name: string;
  public readonly method: ExtractMethod;

  constructor(
    private readonly options: HttpResolverOptions,
    private readonly client: HttpClient,
  ) {
    this.name = options.label ?? `http:${options.uri}`;
    this.method = options.method ?? 'plain-text';
  }

  resolve(version: Version, context: ResolveContext = {}): Resolutions {
    return this.run(version, context);
  }

  private async *run(
    version: Version,
    context: ResolveContext,
  ): AsyncGenerator<Resolution, void, undefined> {
    let url: URL;
    try {
      url = parseHttpUri(this.options.uri);
    } catch (err: unknown) {
      yield failed(new OtherResolveError(err));
      return;
    }

    const host = stripBrackets(url.hostname);
    let candidates: string[];
    if (addressFamily(host) !== undefined) {
      candidates = [host];
    } else {
      try {
        candidates = (await this.client.lookup(host)).map((entry) => entry.address);
      } catch (err: unknown) {
        yield failed(new StrategyError('http', HttpError.from(err)));
        return;
      }
    }

    // Only addresses of the requested family are ever contacted.
    const servers = [...new Set(candidates)].filter((address) => matchesVersion(version, address));

    const perServer: Resolver[] = servers.map((server) => ({
      name: `${this.name}@${server}`,
      resolve: (_version: Version, ctx: ResolveContext = {}) =>
        this.requestServer(url, server, ctx.signal),
    }));

    yield* fallbackStream(perServer, version, context);
  }

  private async *requestServer(
    url: URL,
    server: string,
    signal: AbortSignal | undefined,
  ): AsyncGenerator<Resolution, void, undefined> {
    let response: HttpResponse;
    try {
      response = await this.client.get({
        url,
        address: server,
        headers: this.options.headers,
        signal,
      });
    } catch (err: unknown) {
      yield failed(new StrategyError('http', HttpError.from(err)));
      return;
    }

    const { statusCode, body } = response;
    if (statusCode < 200 || statusCode >= 300) {
      yield failed(
        new StrategyError('http', new HttpError(`HTTP ${statusCode} from ${url.href}`, statusCode)),
      );
      return;
    }

    const candidate = extractCandidate(body, this.method);
    const address = candidate === undefined ? undefined : parseAddress(candidate);
    if (address === undefined) {
      yield failed(new NoAddressError(candidate));
      return;
    }

    yield resolved(address, new HttpDetails({ uri: url.href, server, method: this.method }));
  }
}

function stripBrackets(hostname: string): string {
  return hostname.startsWith('[') && hostname.endsWith(']') ? hostname.slice(1, -1) : hostname;
}

/**
 * Parse an absolute http(s) URI. Throws a TypeError for anything else.
 */
export function parseHttpUri(uri: string): URL {
  const url = new URL(uri);
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new TypeError(`unsupported protocol "${url.protocol}" in ${uri}`);
  }
  return url;
}
