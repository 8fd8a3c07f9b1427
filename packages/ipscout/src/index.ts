/**
 * ipscout - Public IP address discovery
 *
 * Re-exports the engine and both strategies, and adds the provider
 * registry, configuration-driven resolvers, sessions and the one-call
 * `addr` helpers.
 *
 * @packageDocumentation
 */

export * from '@ipscout/core';
export * from '@ipscout/fallback';
export * from '@ipscout/dns';
export * from '@ipscout/http';

export {
  ProviderRegistry,
  builtinProviders,
  type ProviderDeps,
  type ProviderFactory,
  type ProviderInfo,
  type ProviderStrategy,
} from './registry.js';
export { createResolverFromConfig, type ResolverDeps } from './from-config.js';
export {
  ResolverSession,
  createSession,
  openSession,
  type SessionOptions,
  type AttemptOptions,
} from './session.js';
export { addr, addrV4, addrV6, addrWithDetails, type AddrOptions } from './addr.js';
