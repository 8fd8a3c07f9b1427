/**
 * ipscout - Build the resolver described by a configuration
 */

import type { IpscoutConfig, ResolverLike, StrategyKind } from '@ipscout/core';
import { DnsResolver } from '@ipscout/dns';
import { ResolverList } from '@ipscout/fallback';
import { HttpResolver } from '@ipscout/http';
import { ProviderRegistry, type ProviderDeps } from './registry.js';

export type ResolverDeps = Omit<ProviderDeps, 'config'>;

/**
 * One `ResolverList` per enabled strategy group, in `config.order`.
 * Built-in providers come first inside each group, then custom entries in
 * the order they are listed. A group named twice in `order` is used once.
 *
 * @throws Error if a provider name is not registered with `registry`.
 */
export function createResolverFromConfig(
  config: IpscoutConfig,
  deps: ResolverDeps,
  registry: ProviderRegistry = ProviderRegistry.getInstance(),
): ResolverList {
  const providerDeps: ProviderDeps = { ...deps, config };
  const kinds = [...new Set(config.order)].filter((kind) => config[kind].enabled);

  return new ResolverList(
    kinds.map((kind) => new ResolverList(groupMembers(kind, providerDeps, registry), kind)),
    'ipscout',
  );
}

function groupMembers(
  kind: StrategyKind,
  deps: ProviderDeps,
  registry: ProviderRegistry,
): ResolverLike[] {
  const { config } = deps;

  switch (kind) {
    case 'dns':
      return [
        ...config.dns.providers.map((name) => registry.create(name, deps)),
        ...config.dns.custom.map(
          (entry) =>
            new DnsResolver(
              {
                label: entry.label,
                name: entry.name,
                servers: entry.servers,
                port: entry.port ?? config.dns.port,
                method: entry.method,
              },
              deps.dns,
            ),
        ),
      ];
    case 'http':
      return [
        ...config.http.providers.map((name) => registry.create(name, deps)),
        ...config.http.custom.map(
          (entry) =>
            new HttpResolver({ label: entry.label, uri: entry.uri, method: entry.method }, deps.http),
        ),
      ];
  }
}
