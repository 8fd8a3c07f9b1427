/**
 * @ipscout/fallback - Fallback stream
 *
 * Drains resolvers one after another in priority order and presents them as
 * a single lazy stream. The same combinator drives the top-level strategy
 * list and every adapter's own server list.
 */

import {
  createLogger,
  type Resolution,
  type ResolveContext,
  type Resolver,
  type Version,
} from '@ipscout/core';
import { guarded } from './guard.js';

const defaultLog = createLogger('@ipscout/fallback');

/**
 * Concatenate the streams of `resolvers`, in order.
 *
 * - Nothing runs until the first pull; `resolvers[i + 1]` is not started
 *   until the stream of `resolvers[i]` has ended.
 * - Items (successes and errors) are passed through unchanged.
 * - Closing the returned iterator early closes the active inner stream; the
 *   remaining resolvers are never started.
 * - Once `context.signal` is aborted nothing more is emitted or started.
 * - A resolver that throws contributes one OtherResolveError item and the
 *   next resolver is started. An error the consumer throws into the
 *   returned generator closes the active stream and propagates.
 *
 * ```ts
 * for await (const item of fallbackStream([opendns, google], Version.V4)) {
 *   if (item.ok) console.log(item.address);
 * }
 * ```
 */
export function fallbackStream(
  resolvers: readonly Resolver[],
  version: Version,
  context: ResolveContext = {},
): AsyncGenerator<Resolution, void, undefined> {
  // Snapshot now so later mutation of the caller's array cannot reorder us.
  return drain([...resolvers], version, context);
}

async function* drain(
  remaining: Resolver[],
  version: Version,
  context: ResolveContext,
): AsyncGenerator<Resolution, void, undefined> {
  const log = context.logger ?? defaultLog;
  const { signal } = context;

  let position = 0;
  let current = remaining.shift();

  while (current) {
    if (signal?.aborted) {
      log.debug({ skipped: remaining.length + 1 }, 'Aborted, not starting remaining resolvers');
      return;
    }

    const name = current.name ?? `#${position}`;
    log.debug({ resolver: name, version }, 'Starting resolver');

    let emitted = 0;
    const active = current;
    const items = guarded(
      () => active.resolve(version, context),
      (error) => {
        // A resolver broke its contract by throwing.
        log.warn({ resolver: name, error: error.message }, 'Resolver threw instead of yielding an error');
      },
    );
    for await (const item of items) {
      if (signal?.aborted) return;
      emitted++;
      yield item;
    }

    log.debug({ resolver: name, items: emitted }, 'Resolver exhausted');
    position++;
    current = remaining.shift();
  }
}
