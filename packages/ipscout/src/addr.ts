/**
 * ipscout - One-call helpers
 *
 * Each call opens a session, takes the first resolved address and closes
 * the session's clients again.
 */

import { Version, type Resolved } from '@ipscout/core';
import { createSession, type AttemptOptions, type ResolverSession, type SessionOptions } from './session.js';

export type AddrOptions = SessionOptions & AttemptOptions;

async function withSession<T>(
  options: SessionOptions,
  run: (session: ResolverSession) => Promise<T>,
): Promise<T> {
  const session = createSession(options);
  try {
    return await run(session);
  } finally {
    await session.close();
  }
}

/**
 * The public address for `options.version` (default: the configured
 * version), or `undefined` if every provider failed.
 *
 * ```ts
 * const ip = await addr();
 * ```
 */
export function addr(options: AddrOptions = {}): Promise<string | undefined> {
  const { version, signal, ...sessionOptions } = options;
  return withSession(sessionOptions, (session) => session.addr({ version, signal }));
}

export function addrV4(options: Omit<AddrOptions, 'version'> = {}): Promise<string | undefined> {
  return addr({ ...options, version: Version.V4 });
}

export function addrV6(options: Omit<AddrOptions, 'version'> = {}): Promise<string | undefined> {
  return addr({ ...options, version: Version.V6 });
}

/**
 * Like {@link addr}, but also returns how the address was obtained.
 */
export function addrWithDetails(
  version: Version,
  options: Omit<AddrOptions, 'version'> = {},
): Promise<Resolved | undefined> {
  const { signal, ...sessionOptions } = options;
  return withSession(sessionOptions, (session) => session.resolution({ version, signal }));
}
