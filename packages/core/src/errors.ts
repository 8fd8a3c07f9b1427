/**
 * @ipscout/core - Resolution errors
 *
 * Errors are values here: strategies yield them alongside successes and the
 * pipeline passes them downstream. Nothing in the engine throws these.
 */

import type { Version } from './version.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ResolveErrorKind = 'no-address' | 'version-mismatch' | 'strategy' | 'other';

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

/** Base class of every error that can appear in a resolution stream. */
export abstract class ResolveError extends Error {
  abstract readonly kind: ResolveErrorKind;

  /**
   * Wrap an arbitrary thrown value. The concrete error classes below are
   * returned unchanged, anything else becomes an {@link OtherResolveError}.
   */
  static from(err: unknown): AnyResolveError {
    if (
      err instanceof NoAddressError ||
      err instanceof VersionMismatchError ||
      err instanceof StrategyError ||
      err instanceof OtherResolveError
    ) {
      return err;
    }
    return new OtherResolveError(err);
  }
}

// ---------------------------------------------------------------------------
// Variants
// ---------------------------------------------------------------------------

/** No address, or a string that is not an IP address, was found. */
export class NoAddressError extends ResolveError {
  readonly kind = 'no-address' as const;
  public readonly candidate: string | undefined;

  constructor(candidate?: string) {
    super(
      candidate === undefined || candidate.trim() === ''
        ? 'no IP address string found'
        : `invalid IP address string "${candidate}"`,
    );
    this.name = 'NoAddressError';
    this.candidate = candidate;
  }
}

/** A strategy returned an address of a version that was not requested. */
export class VersionMismatchError extends ResolveError {
  readonly kind = 'version-mismatch' as const;

  constructor(
    public readonly requested: Version,
    public readonly address: string,
  ) {
    super(`address ${address} does not match requested version ${requested}`);
    this.name = 'VersionMismatchError';
  }
}

/**
 * A strategy-specific failure (DNS query error, HTTP error, ...). The original
 * error is kept as `cause`.
 */
export class StrategyError<E extends Error = Error> extends ResolveError {
  readonly kind = 'strategy' as const;
  public readonly cause: E;

  constructor(
    public readonly strategy: string,
    cause: E,
  ) {
    super(`${strategy} resolver: ${cause.message}`);
    this.name = 'StrategyError';
    this.cause = cause;
  }
}

/** Any other failure, wrapping an opaque cause. */
export class OtherResolveError extends ResolveError {
  readonly kind = 'other' as const;
  public readonly cause: unknown;

  constructor(cause: unknown) {
    super(`other resolver: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'OtherResolveError';
    this.cause = cause;
  }
}

/**
 * Union of the concrete error classes. Error items carry this type, so a
 * `switch (error.kind)` narrows to the matching class.
 */
export type AnyResolveError =
  | NoAddressError
  | VersionMismatchError
  | StrategyError
  | OtherResolveError;
