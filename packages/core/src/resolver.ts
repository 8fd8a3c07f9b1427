/**
 * @ipscout/core - Resolver contract
 *
 * Implemented by single strategies and by composites alike, so callers never
 * need to tell "one strategy" from "many".
 */

import type { Logger } from 'pino';
import type { Resolutions } from './resolution.js';
import type { Version } from './version.js';

/** Per-attempt context handed down through every nesting level. */
export interface ResolveContext {
  /** Aborting stops the stream and cancels the in-flight query. */
  signal?: AbortSignal;
  logger?: Logger;
}

export interface Resolver {
  /** Used in log lines only. */
  readonly name?: string;
  /**
   * Produce a fresh, lazy stream of resolutions for `version`. Must not
   * perform I/O until the stream is iterated, and must be safe to call
   * repeatedly and concurrently.
   */
  resolve(version: Version, context?: ResolveContext): Resolutions;
}

/** A resolver, or an ordered (possibly nested) list of them. */
export type ResolverLike = Resolver | readonly ResolverLike[];
