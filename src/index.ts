/**
 * @module
 * The main entry point for "fanout": bounded, fault-tolerant parallel
 * iteration over ranges and collections, with cooperative cancellation.
 */

// Range scheduler (forRange, forRangeWithContext, forRangeSettled)
export {
  forRange,
  forRangeWithContext,
  forRangeSettled,
  type IndexFn,
  type RangeReport,
} from './scheduler';

// Combinators (race, all, allWithContext, allSettled)
export * from './structured-concurrency';

// Collection adapters (forEach family)
export * from './collections';

// Cancellation tokens (background, withCancel, withDeadline, withTimeout)
export * from './cancellation';

// Per-unit async context
export { getUnitContext, getUnitContextOrUndefined, type UnitContext } from './context';

// Options, defaults-bound toolsets and logging
export * from './options';
export * from './createParallel';
export * from './logger';

// Error types and the Result boundary
export * from './errors';
export { CompletionBarrier, type UnitOutcome } from './barrier';
export { HandoffChannel } from './channel';
