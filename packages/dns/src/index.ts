/**
 * @ipscout/dns - DNS strategy
 *
 * @packageDocumentation
 */

export { DnsDetails, isDnsDetails, formatSocketAddress, type QueryMethod } from './details.js';
export {
  NodeDnsTransport,
  DnsQueryError,
  type DnsTransport,
  type DnsQuery,
  type NodeDnsTransportOptions,
} from './transport.js';
export {
  DnsResolver,
  DEFAULT_DNS_PORT,
  isValidDnsName,
  parseAnswer,
  type DnsResolverOptions,
} from './resolver.js';
export {
  OPENDNS_V4,
  OPENDNS_V6,
  GOOGLE_V4,
  GOOGLE_V6,
  DNS_PROVIDERS,
  createDnsProvider,
  createDnsProviders,
  type DnsProviderOverrides,
} from './providers.js';
