/**
 * @ipscout/fallback - Guarded streams
 */

import { failed, ResolveError, type AnyResolveError, type Resolution } from '@ipscout/core';

export type ResolutionSource = AsyncIterable<Resolution> | Iterable<Resolution>;

function isAsyncIterable(source: ResolutionSource): source is AsyncIterable<Resolution> {
  return Symbol.asyncIterator in source;
}

/**
 * Drive the stream returned by `open`. If `open` or the stream throws, the
 * failure becomes one error item and the stream ends. Errors the consumer
 * throws into the returned generator are not caught: the source is closed
 * and the error propagates.
 */
export async function* guarded(
  open: () => ResolutionSource,
  onError?: (error: AnyResolveError) => void,
): AsyncGenerator<Resolution, void, undefined> {
  const report = (err: unknown): Resolution => {
    const error = ResolveError.from(err);
    onError?.(error);
    return failed(error);
  };

  let iterator: AsyncIterator<Resolution> | Iterator<Resolution>;
  try {
    const source = open();
    iterator = isAsyncIterable(source) ? source[Symbol.asyncIterator]() : source[Symbol.iterator]();
  } catch (err: unknown) {
    yield report(err);
    return;
  }

  let finished = false;
  try {
    for (;;) {
      let step: IteratorResult<Resolution>;
      try {
        step = await iterator.next();
      } catch (err: unknown) {
        finished = true;
        yield report(err);
        return;
      }
      if (step.done) {
        finished = true;
        return;
      }
      yield step.value;
    }
  } finally {
    if (!finished) await iterator.return?.();
  }
}
