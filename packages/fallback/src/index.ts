/**
 * @ipscout/fallback - Ordered, lazy fallback across resolvers
 *
 * Provides:
 *   - fallbackStream, the combinator that drains resolvers in priority order
 *   - Composite resolvers (lists, function-backed, deferred)
 *   - The resolution pipeline with version checking and best-effort helpers
 *
 * @packageDocumentation
 */

// Combinator
export { fallbackStream } from './chain.js';

// Composites
export {
  ResolverList,
  DynResolver,
  DeferredResolver,
  toResolver,
  defineResolver,
  deferResolver,
  type ResolveFn,
} from './resolvers.js';

// Pipeline
export {
  resolve,
  bestEffortAddress,
  bestEffortResolution,
  collectResolutions,
} from './pipeline.js';
