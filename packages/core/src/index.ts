/**
 * @ipscout/core - Shared types for ipscout
 *
 * Version selection, resolution results, the error taxonomy, the Resolver
 * contract, logging and configuration.
 */

// Version
export {
  Version,
  matchesVersion,
  addressFamily,
  parseAddress,
  parseVersion,
  type AddressFamily,
} from './version.js';

// Errors
export {
  ResolveError,
  NoAddressError,
  VersionMismatchError,
  StrategyError,
  OtherResolveError,
  type ResolveErrorKind,
  type AnyResolveError,
} from './errors.js';

// Resolutions
export {
  CustomDetails,
  resolved,
  failed,
  type Details,
  type Resolved,
  type Resolution,
  type ResolutionOk,
  type ResolutionErr,
  type Resolutions,
} from './resolution.js';

// Resolver contract
export type { Resolver, ResolverLike, ResolveContext } from './resolver.js';

// Logging
export { createLogger, isLogLevel, resolveLogLevel, type Logger } from './logger.js';

// Configuration
export * from './config/index.js';
