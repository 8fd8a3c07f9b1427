/**
 * ipscout - ProviderRegistry
 *
 * Maps provider names (e.g. "opendns", "ipify-org") to factories that build
 * their resolvers. Ships with every built-in DNS and HTTP provider; hosts can
 * register their own or replace a built-in at runtime.
 */

import {
  createLogger,
  DNS_PROVIDER_NAMES,
  HTTP_PROVIDER_NAMES,
  type IpscoutConfig,
  type Logger,
  type Resolver,
  type ResolverLike,
  type StrategyKind,
} from '@ipscout/core';
import { createDnsProvider, type DnsTransport } from '@ipscout/dns';
import { deferResolver } from '@ipscout/fallback';
import { createHttpProvider, type HttpClient } from '@ipscout/http';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** What a provider factory gets to build its resolver with. */
export interface ProviderDeps {
  dns: DnsTransport;
  http: HttpClient;
  config: IpscoutConfig;
}

export type ProviderFactory = (deps: ProviderDeps) => ResolverLike;

export type ProviderStrategy = 'dns' | 'http' | 'custom';

export interface ProviderInfo {
  name: string;
  strategy: ProviderStrategy;
}

interface ProviderEntry extends ProviderInfo {
  factory: ProviderFactory;
}

// ---------------------------------------------------------------------------
// ProviderRegistry
// ---------------------------------------------------------------------------

/**
 * ```ts
 * const registry = ProviderRegistry.getInstance();
 * registry.register('corp-echo', 'custom', ({ http }) =>
 *   new HttpResolver({ uri: 'https://echo.corp.example/ip' }, http),
 * );
 * const resolver = registry.create('corp-echo', deps);
 * ```
 */
export class ProviderRegistry {
  private static instance: ProviderRegistry | undefined;

  private readonly providers = new Map<string, ProviderEntry>();
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? createLogger('ipscout-registry');
    this.registerDefaults();
  }

  /** Get (or create) the shared instance. */
  static getInstance(logger?: Logger): ProviderRegistry {
    if (!ProviderRegistry.instance) {
      ProviderRegistry.instance = new ProviderRegistry(logger);
    }
    return ProviderRegistry.instance;
  }

  /**
   * Reset the shared instance. Primarily useful in tests.
   */
  static resetInstance(): void {
    ProviderRegistry.instance = undefined;
  }

  // -----------------------------------------------------------------------
  // Registration
  // -----------------------------------------------------------------------

  /**
   * Register (or replace) a provider. A "custom" provider may be listed in
   * either group of a configuration; "dns" and "http" providers only in
   * their own.
   */
  register(name: string, strategy: ProviderStrategy, factory: ProviderFactory): void {
    if (this.providers.has(name)) {
      this.log.info({ provider: name, strategy }, 'Replacing registered provider');
    }
    this.providers.set(name, { name, strategy, factory });
  }

  supports(name: string): boolean {
    return this.providers.has(name);
  }

  /**
   * Names a configuration may list under the `kind` group, in registration
   * order.
   */
  namesFor(kind: StrategyKind): string[] {
    return this.list()
      .filter(({ strategy }) => strategy === kind || strategy === 'custom')
      .map(({ name }) => name);
  }

  /**
   * List registered providers in registration order.
   */
  list(): ProviderInfo[] {
    return Array.from(this.providers.values(), ({ name, strategy }) => ({ name, strategy }));
  }

  /**
   * Build the resolver for `name`. The factory runs when the resolver is
   * first driven; if it throws, that failure becomes the resolver's only
   * item.
   *
   * @throws Error if no provider is registered under `name`.
   */
  create(name: string, deps: ProviderDeps): Resolver {
    const entry = this.providers.get(name);
    if (!entry) {
      throw new Error(`No provider registered under "${name}"`);
    }
    return deferResolver(name, () => entry.factory(deps));
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private registerDefaults(): void {
    for (const name of DNS_PROVIDER_NAMES) {
      this.providers.set(name, {
        name,
        strategy: 'dns',
        factory: ({ dns, config }) => createDnsProvider(name, dns, { port: config.dns.port }),
      });
    }
    for (const name of HTTP_PROVIDER_NAMES) {
      this.providers.set(name, {
        name,
        strategy: 'http',
        factory: ({ http }) => createHttpProvider(name, http),
      });
    }

    this.log.debug({ providers: Array.from(this.providers.keys()) }, 'Built-in providers registered');
  }
}

/** Names and strategies of every built-in provider. */
export function builtinProviders(): ProviderInfo[] {
  return [
    ...DNS_PROVIDER_NAMES.map((name): ProviderInfo => ({ name, strategy: 'dns' })),
    ...HTTP_PROVIDER_NAMES.map((name): ProviderInfo => ({ name, strategy: 'http' })),
  ];
}
