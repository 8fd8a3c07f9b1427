/**
 * @ipscout/fallback - Resolution pipeline
 *
 * Public entry points: the validated stream, and the best-effort helpers
 * that skip every error and stop at the first success.
 */

import {
  addressFamily,
  createLogger,
  failed,
  matchesVersion,
  NoAddressError,
  VersionMismatchError,
  type Logger,
  type Resolution,
  type ResolveContext,
  type Resolved,
  type ResolverLike,
  type Version,
} from '@ipscout/core';
import { fallbackStream } from './chain.js';
import { toResolver } from './resolvers.js';

const defaultLog = createLogger('@ipscout/fallback');

/**
 * Drive `resolvers` in priority order and return every item they produce.
 *
 * Successful items are re-checked here: an address that is not an IP
 * address becomes a NoAddressError, one of the wrong family becomes a
 * VersionMismatchError. Neither is dropped, so the full stream still shows
 * the failure.
 */
export function resolve(
  resolvers: ResolverLike,
  version: Version,
  context: ResolveContext = {},
): AsyncGenerator<Resolution, void, undefined> {
  const log = (context.logger ?? defaultLog).child({ version });
  const stream = fallbackStream([toResolver(resolvers)], version, { ...context, logger: log });
  return validate(stream, version, log);
}

async function* validate(
  stream: AsyncIterable<Resolution>,
  version: Version,
  log: Logger,
): AsyncGenerator<Resolution, void, undefined> {
  for await (const item of stream) {
    if (!item.ok) {
      log.debug({ error: item.error.message, kind: item.error.kind }, 'Resolution failed');
      yield item;
    } else if (addressFamily(item.address) === undefined) {
      log.debug({ address: item.address }, 'Resolver returned a non-address');
      yield failed(new NoAddressError(item.address));
    } else if (!matchesVersion(version, item.address)) {
      log.debug({ address: item.address }, 'Resolver returned an address of the wrong version');
      yield failed(new VersionMismatchError(version, item.address));
    } else {
      log.debug({ address: item.address, kind: item.details.kind }, 'Resolved address');
      yield item;
    }
  }
}

/**
 * First successful resolution, with its details (best effort).
 *
 * Errors are skipped, never retried; returns `undefined` once every
 * resolver is exhausted without a success.
 */
export async function bestEffortResolution(
  resolvers: ResolverLike,
  version: Version,
  context: ResolveContext = {},
): Promise<Resolved | undefined> {
  for await (const item of resolve(resolvers, version, context)) {
    if (item.ok) {
      return { address: item.address, details: item.details };
    }
  }
  return undefined;
}

/**
 * First successfully resolved address (best effort).
 */
export async function bestEffortAddress(
  resolvers: ResolverLike,
  version: Version,
  context: ResolveContext = {},
): Promise<string | undefined> {
  const resolution = await bestEffortResolution(resolvers, version, context);
  return resolution?.address;
}

/**
 * Drain the whole validated stream. Useful for auditing which strategies
 * fail and why.
 */
export async function collectResolutions(
  resolvers: ResolverLike,
  version: Version,
  context: ResolveContext = {},
): Promise<Resolution[]> {
  const items: Resolution[] = [];
  for await (const item of resolve(resolvers, version, context)) {
    items.push(item);
  }
  return items;
}
