/**
 * ipscout - ResolverSession
 *
 * Bundles a configuration, the clients it needs and the resolver built from
 * them. Clients the session creates are closed by `close()`; injected
 * clients are left to their owner.
 */

import {
  createLogger,
  DEFAULT_CONFIG,
  loadConfig,
  type IpscoutConfig,
  type Logger,
  type Resolution,
  type ResolveContext,
  type Resolved,
  type Version,
} from '@ipscout/core';
import { NodeDnsTransport, type DnsTransport } from '@ipscout/dns';
import {
  bestEffortAddress,
  bestEffortResolution,
  collectResolutions,
  resolve,
  ResolverList,
} from '@ipscout/fallback';
import { createHttpClient, type HttpClient } from '@ipscout/http';
import { createResolverFromConfig } from './from-config.js';
import { ProviderRegistry } from './registry.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SessionOptions {
  /** Defaults to DEFAULT_CONFIG. */
  config?: IpscoutConfig;
  dnsTransport?: DnsTransport;
  httpClient?: HttpClient;
  registry?: ProviderRegistry;
  logger?: Logger;
}

export interface AttemptOptions {
  /** Defaults to the configured version. */
  version?: Version;
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// ResolverSession
// ---------------------------------------------------------------------------

export class ResolverSession {
  readonly config: IpscoutConfig;
  readonly resolver: ResolverList;

  private readonly log: Logger;
  private readonly ownedHttpClient: HttpClient | undefined;
  private closed = false;

  constructor(options: SessionOptions = {}) {
    this.config = options.config ?? structuredClone(DEFAULT_CONFIG);
    this.log = options.logger ?? createLogger('ipscout');

    const dns =
      options.dnsTransport ??
      new NodeDnsTransport({ timeoutMs: this.config.timeoutMs, tries: this.config.dns.tries });

    let http = options.httpClient;
    if (!http) {
      http = createHttpClient({
        timeoutMs: this.config.timeoutMs,
        userAgent: this.config.http.userAgent,
      });
      this.ownedHttpClient = http;
    }

    this.resolver = createResolverFromConfig(this.config, { dns, http }, options.registry);
    this.log.debug(
      {
        version: this.config.version,
        groups: this.groups().map((group) => ({ name: group.name, providers: group.size })),
      },
      'Resolver session created',
    );
  }

  /**
   * The enabled strategy groups, in the order they are tried. An enabled
   * group with no providers is listed with size 0.
   */
  groups(): ResolverList[] {
    return this.resolver
      .members()
      .flatMap((member) => (member instanceof ResolverList ? [member] : []));
  }

  /** Every validated item, in priority order. */
  resolve(options: AttemptOptions = {}): AsyncGenerator<Resolution, void, undefined> {
    return resolve(this.resolver, this.versionOf(options), this.contextOf(options));
  }

  /** First resolved address, or `undefined`. */
  addr(options: AttemptOptions = {}): Promise<string | undefined> {
    return bestEffortAddress(this.resolver, this.versionOf(options), this.contextOf(options));
  }

  /** First resolved address with its details, or `undefined`. */
  resolution(options: AttemptOptions = {}): Promise<Resolved | undefined> {
    return bestEffortResolution(this.resolver, this.versionOf(options), this.contextOf(options));
  }

  collect(options: AttemptOptions = {}): Promise<Resolution[]> {
    return collectResolutions(this.resolver, this.versionOf(options), this.contextOf(options));
  }

  /**
   * Release the clients this session created. Safe to call twice.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.ownedHttpClient) {
      await this.ownedHttpClient.close();
    }
    this.log.debug('Resolver session closed');
  }

  private versionOf(options: AttemptOptions): Version {
    return options.version ?? this.config.version;
  }

  private contextOf(options: AttemptOptions): ResolveContext {
    return { signal: options.signal, logger: this.log };
  }
}

export function createSession(options: SessionOptions = {}): ResolverSession {
  return new ResolverSession(options);
}

/**
 * Load the configuration file (argument, else `IPSCOUT_CONFIG`, else
 * defaults) and open a session on it. The configuration may list every
 * provider registered with the session's registry.
 *
 * @throws ConfigError if the file is unreadable or invalid.
 */
export async function openSession(
  configPath?: string,
  options: Omit<SessionOptions, 'config'> = {},
): Promise<ResolverSession> {
  const registry = options.registry ?? ProviderRegistry.getInstance();
  const { config, validation } = await loadConfig(configPath, {
    providers: { dns: registry.namesFor('dns'), http: registry.namesFor('http') },
  });
  const log = options.logger ?? createLogger('ipscout');
  for (const warning of validation.warnings) {
    log.warn({ path: warning.path }, warning.message);
  }
  return new ResolverSession({ ...options, config, registry, logger: log });
}
