/**
 * @ipscout/core - Resolution results
 */

import type { AnyResolveError } from './errors.js';

// ---------------------------------------------------------------------------
// Details
// ---------------------------------------------------------------------------

/**
 * Evidence of how an address was obtained. The engine never looks inside;
 * consumers recover strategy-specific fields by checking the concrete class
 * (see `isDnsDetails` / `isHttpDetails` in the adapter packages).
 */
export interface Details {
  /** Strategy tag, e.g. "dns" or "http". */
  readonly kind: string;
}

/** Details attached by resolvers defined with plain functions. */
export class CustomDetails implements Details {
  constructor(
    public readonly kind: string,
    public readonly source?: string,
  ) {
    Object.freeze(this);
  }
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/** A successfully resolved address together with its evidence. */
export interface Resolved<D extends Details = Details> {
  readonly address: string;
  readonly details: D;
}

export interface ResolutionOk<D extends Details = Details> extends Resolved<D> {
  readonly ok: true;
}

export interface ResolutionErr {
  readonly ok: false;
  readonly error: AnyResolveError;
}

/** One item of a resolution stream. */
export type Resolution<D extends Details = Details> = ResolutionOk<D> | ResolutionErr;

/** A lazy stream of resolutions. Nothing happens until it is iterated. */
export type Resolutions = AsyncIterable<Resolution>;

export function resolved<D extends Details>(address: string, details: D): ResolutionOk<D> {
  return { ok: true, address, details };
}

export function failed(error: AnyResolveError): ResolutionErr {
  return { ok: false, error };
}
