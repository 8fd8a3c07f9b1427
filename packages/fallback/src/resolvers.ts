/**
 * @ipscout/fallback - Composite resolvers
 *
 * Lists, function-backed resolvers and resolvers whose construction is
 * deferred until they are first driven.
 */

import {
  type Resolution,
  type ResolveContext,
  type Resolver,
  type ResolverLike,
  type Resolutions,
  type Version,
} from '@ipscout/core';
import { fallbackStream } from './chain.js';
import { guarded } from './guard.js';

// ---------------------------------------------------------------------------
// ResolverList
// ---------------------------------------------------------------------------

/**
 * An ordered list of resolvers that behaves as a single resolver: each
 * member is drained completely before the next one is started.
 *
 * ```ts
 * const all = new ResolverList([opendns, google, ipify], 'builtin');
 * ```
 */
export class ResolverList implements Resolver {
  public readonly name: string | undefined;
  private readonly resolvers: readonly Resolver[];

  constructor(resolvers: readonly ResolverLike[], name?: string) {
    this.resolvers = resolvers.map(toResolver);
    this.name = name;
  }

  /** Number of direct members. */
  get size(): number {
    return this.resolvers.length;
  }

  /** Direct members, in priority order. */
  members(): readonly Resolver[] {
    return this.resolvers;
  }

  resolve(version: Version, context: ResolveContext = {}): Resolutions {
    return fallbackStream(this.resolvers, version, context);
  }
}

/**
 * Accept a resolver or a (nested) array of resolvers wherever a resolver is
 * expected.
 */
export function toResolver(like: ResolverLike): Resolver {
  if ('resolve' in like) return like;
  return new ResolverList(like);
}

// ---------------------------------------------------------------------------
// DynResolver
// ---------------------------------------------------------------------------

export type ResolveFn = (
  version: Version,
  context: ResolveContext,
) => AsyncIterable<Resolution> | Iterable<Resolution>;

/**
 * A resolver backed by a plain function. The function is not called until
 * the returned stream is first pulled, so even an eager function stays lazy.
 * If the function or its stream throws, the failure becomes one
 * OtherResolveError item and the stream ends.
 */
export class DynResolver implements Resolver {
  constructor(
    public readonly name: string,
    private readonly fn: ResolveFn,
  ) {}

  resolve(version: Version, context: ResolveContext = {}): Resolutions {
    return guarded(() => this.fn(version, context));
  }
}

/**
 * Define a resolver from a function.
 *
 * ```ts
 * const fromEnv = defineResolver('env', function* () {
 *   const ip = process.env['PUBLIC_IP'];
 *   yield ip ? resolved(ip, new CustomDetails('env')) : failed(new NoAddressError());
 * });
 * ```
 */
export function defineResolver(name: string, fn: ResolveFn): DynResolver {
  return new DynResolver(name, fn);
}

// ---------------------------------------------------------------------------
// DeferredResolver
// ---------------------------------------------------------------------------

/**
 * A resolver built at resolve time. If building it throws, the stream yields
 * that failure as its only item instead of breaking the caller.
 */
export class DeferredResolver implements Resolver {
  constructor(
    public readonly name: string,
    private readonly factory: () => ResolverLike,
  ) {}

  resolve(version: Version, context: ResolveContext = {}): Resolutions {
    return guarded(() => toResolver(this.factory()).resolve(version, context));
  }
}

export function deferResolver(name: string, factory: () => ResolverLike): DeferredResolver {
  return new DeferredResolver(name, factory);
}
