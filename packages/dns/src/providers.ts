/**
 * @ipscout/dns - Built-in DNS providers
 *
 * Each provider is an IPv4 and an IPv6 variant; the variant whose servers
 * cannot serve the requested version contributes nothing.
 */

import { DNS_PROVIDER_NAMES, type DnsProviderName } from '@ipscout/core';
import { ResolverList } from '@ipscout/fallback';
import { DnsResolver, type DnsResolverOptions } from './resolver.js';
import type { DnsTransport } from './transport.js';

export const OPENDNS_V4: DnsResolverOptions = {
  label: 'opendns-v4',
  name: 'myip.opendns.com',
  servers: ['208.67.222.222', '208.67.220.220', '208.67.222.220', '208.67.220.222'],
  method: 'A',
};

export const OPENDNS_V6: DnsResolverOptions = {
  label: 'opendns-v6',
  name: 'myip.opendns.com',
  servers: ['2620:0:ccc::2', '2620:0:ccd::2'],
  method: 'AAAA',
};

export const GOOGLE_V4: DnsResolverOptions = {
  label: 'google-v4',
  name: 'o-o.myaddr.l.google.com',
  servers: ['216.239.32.10', '216.239.34.10', '216.239.36.10', '216.239.38.10'],
  method: 'TXT',
};

export const GOOGLE_V6: DnsResolverOptions = {
  label: 'google-v6',
  name: 'o-o.myaddr.l.google.com',
  servers: [
    '2001:4860:4802:32::a',
    '2001:4860:4802:34::a',
    '2001:4860:4802:36::a',
    '2001:4860:4802:38::a',
  ],
  method: 'TXT',
};

export const DNS_PROVIDERS = {
  opendns: [OPENDNS_V4, OPENDNS_V6],
  google: [GOOGLE_V4, GOOGLE_V6],
} as const satisfies Record<DnsProviderName, readonly DnsResolverOptions[]>;

export interface DnsProviderOverrides {
  /** Replaces the port of every built-in variant. */
  port?: number;
}

/** One built-in provider (both variants) as a single resolver. */
export function createDnsProvider(
  name: DnsProviderName,
  transport: DnsTransport,
  overrides: DnsProviderOverrides = {},
): ResolverList {
  const variants = DNS_PROVIDERS[name].map(
    (options) => new DnsResolver({ ...options, port: overrides.port ?? options.port }, transport),
  );
  return new ResolverList(variants, name);
}

/** Several built-in providers, in the given order (default: all of them). */
export function createDnsProviders(
  transport: DnsTransport,
  names: readonly DnsProviderName[] = DNS_PROVIDER_NAMES,
  overrides: DnsProviderOverrides = {},
): ResolverList {
  return new ResolverList(
    names.map((name) => createDnsProvider(name, transport, overrides)),
    'dns',
  );
}
