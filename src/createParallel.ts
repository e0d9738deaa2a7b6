import type { Result } from 'neverthrow';
import type { CancellationToken } from './cancellation';
import { forEach, forEachEntry, forEachIndex, forEachKey, forEachProperty, repeatFor } from './collections';
import type { AggregatedFailure } from './errors';
import type { ExecutionOptions } from './options';
import {
  type IndexFn,
  type RangeReport,
  forRange,
  forRangeSettled,
  forRangeWithContext,
} from './scheduler';
import {
  type RaceOptions,
  type Task,
  all,
  allSettled,
  allWithContext,
  race,
} from './structured-concurrency';

/**
 * The scheduling functions, bound to a defaults object.
 */
export interface ParallelTools {
  forRange(begin: number, end: number, fn: IndexFn, ...options: ExecutionOptions[]): Promise<void>;
  forRangeWithContext(
    token: CancellationToken,
    begin: number,
    end: number,
    fn: IndexFn,
    ...options: ExecutionOptions[]
  ): Promise<void>;
  forRangeSettled(
    token: CancellationToken,
    begin: number,
    end: number,
    fn: IndexFn,
    ...options: ExecutionOptions[]
  ): Promise<Result<RangeReport, AggregatedFailure>>;
  all(tasks: readonly Task[], ...options: ExecutionOptions[]): Promise<void>;
  allWithContext(token: CancellationToken, tasks: readonly Task[], ...options: ExecutionOptions[]): Promise<void>;
  allSettled(tasks: readonly Task[], ...options: ExecutionOptions[]): Promise<Result<RangeReport, AggregatedFailure>>;
  race(tasks: readonly Task[], options?: RaceOptions): Promise<number | undefined>;
  forEach: typeof forEach;
  forEachIndex: typeof forEachIndex;
  forEachEntry: typeof forEachEntry;
  forEachKey: typeof forEachKey;
  forEachProperty: typeof forEachProperty;
  repeatFor: typeof repeatFor;
  /** The defaults these tools were created with. */
  readonly defaults: Readonly<ExecutionOptions>;
}

/**
 * Creates a toolset whose calls fall back to `defaults` when they are given
 * no options of their own. Like any options list, the defaults are used as a
 * whole: a call passing `{ workerCount: 2 }` does not inherit the default
 * `logger`.
 *
 * @example
 * ```typescript
 * const parallel = createParallel({ workerCount: 8, logger: console });
 *
 * await parallel.forEach(paths, async (path, i) => {
 *   contents[i] = await readFile(path, 'utf8');
 * });
 * ```
 */
export function createParallel(defaults: ExecutionOptions = {}): ParallelTools {
  const frozen: Readonly<ExecutionOptions> = Object.freeze({ ...defaults });
  const pick = (options: ExecutionOptions[]): ExecutionOptions[] =>
    options.length > 0 ? options : [frozen];

  return {
    defaults: frozen,
    forRange: (begin, end, fn, ...options) => forRange(begin, end, fn, ...pick(options)),
    forRangeWithContext: (token, begin, end, fn, ...options) =>
      forRangeWithContext(token, begin, end, fn, ...pick(options)),
    forRangeSettled: (token, begin, end, fn, ...options) =>
      forRangeSettled(token, begin, end, fn, ...pick(options)),
    all: (tasks, ...options) => all(tasks, ...pick(options)),
    allWithContext: (token, tasks, ...options) => allWithContext(token, tasks, ...pick(options)),
    allSettled: (tasks, ...options) => allSettled(tasks, ...pick(options)),
    race: (tasks, options) =>
      race(tasks, options ?? { onPanic: frozen.onPanic, logger: frozen.logger }),
    forEach: (items, fn, ...options) => forEach(items, fn, ...pick(options)),
    forEachIndex: (items, fn, ...options) => forEachIndex(items, fn, ...pick(options)),
    forEachEntry: (map, fn, ...options) => forEachEntry(map, fn, ...pick(options)),
    forEachKey: (map, fn, ...options) => forEachKey(map, fn, ...pick(options)),
    forEachProperty: (record, fn, ...options) => forEachProperty(record, fn, ...pick(options)),
    repeatFor: (collection, fn, ...options) => repeatFor(collection, fn, ...pick(options)),
  };
}
