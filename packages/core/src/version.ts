/**
 * @ipscout/core - IP version selection
 *
 * The address family a caller asks for, and the predicate every resolved
 * address is checked against before it leaves the pipeline.
 */

import { isIP } from 'node:net';

export const Version = {
  V4: 'v4',
  V6: 'v6',
  Any: 'any',
} as const;

/** Requested address family. */
export type Version = (typeof Version)[keyof typeof Version];

/** Address family of a parsed IP address. */
export type AddressFamily = 4 | 6;

/**
 * Family of an IP address string, or `undefined` when the string is not an
 * IP address.
 */
export function addressFamily(address: string): AddressFamily | undefined {
  const family = isIP(address);
  if (family === 4 || family === 6) return family;
  return undefined;
}

/**
 * Returns `true` when `address` is an IP address whose family satisfies
 * `version`. `any` accepts both families but still rejects non-addresses.
 */
export function matchesVersion(version: Version, address: string): boolean {
  const family = addressFamily(address);
  if (family === undefined) return false;

  switch (version) {
    case Version.Any:
      return true;
    case Version.V4:
      return family === 4;
    case Version.V6:
      return family === 6;
  }
}

/** Narrow an arbitrary string (env var, config value) to a Version. */
export function parseVersion(value: string): Version | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'v4' || normalized === '4' || normalized === 'ipv4') return Version.V4;
  if (normalized === 'v6' || normalized === '6' || normalized === 'ipv6') return Version.V6;
  if (normalized === 'any' || normalized === '') return Version.Any;
  return undefined;
}

/**
 * Parse a candidate address string as returned by a DNS answer or an HTTP
 * body. Surrounding whitespace is dropped; anything else must already be a
 * bare IP address.
 */
export function parseAddress(candidate: string): string | undefined {
  const trimmed = candidate.trim();
  if (trimmed.length === 0) return undefined;
  return addressFamily(trimmed) === undefined ? undefined : trimmed;
}
