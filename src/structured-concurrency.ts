/**
 * @module
 * Combinators over lists of zero-input tasks: `race` for the first finisher,
 * and the `all` family, which is the range scheduler applied to
 * `[0, tasks.length)`.
 */

import type { Result } from 'neverthrow';
import { type CancellationToken, background } from './cancellation';
import type { AggregatedFailure } from './errors';
import { type Logger, noopLogger } from './logger';
import type { ExecutionOptions, PanicHandler } from './options';
import {
  type RangeReport,
  executeUnit,
  forRange,
  forRangeSettled,
  forRangeWithContext,
  spawn,
} from './scheduler';

/**
 * A unit of work in a combinator. It receives the combinator's cancellation
 * scope and may ignore it.
 */
export type Task = (token: CancellationToken) => void | Promise<void>;

export interface RaceOptions {
  /** A parent token; if it fires before any task finishes, the race ends. */
  token?: CancellationToken;
  /** Takes failures of racing tasks. Without it they are only logged at debug. */
  onPanic?: PanicHandler;
  logger?: Logger;
}

// =================================================================
// Section 1: Race
// =================================================================

/**
 * Runs all `tasks` concurrently and resolves with the index of the first one
 * to finish, whether it returned or failed. The race's scope then fires so the
 * others can wind down cooperatively; they are not stopped and may keep
 * running after `race` has resolved.
 *
 * Resolves `undefined` when `tasks` is empty, or when `options.token` fires
 * before any task finishes.
 *
 * @example
 * ```typescript
 * const winner = await race([
 *   (token) => fetchFrom(primary, token.signal),
 *   (token) => fetchFrom(mirror, token.signal),
 * ]);
 * ```
 */
export async function race(
  tasks: readonly Task[],
  options: RaceOptions = {},
): Promise<number | undefined> {
  const logger = options.logger ?? noopLogger;
  if (tasks.length === 0) return undefined;

  const scope = (options.token ?? background()).child();
  if (scope.isCancelled) return undefined;

  let winner: number | undefined;
  const cancelled = scope.whenCancelled();
  const unitOptions = { workerCount: 0, onPanic: options.onPanic, logger };

  tasks.forEach((task, index) => {
    spawn(async () => {
      const outcome = await executeUnit(index, (_, token) => task(token), scope, unitOptions);
      if (outcome.isErr() && !outcome.error.handled) {
        logger.debug(`[race] Task ${index} failed`, outcome.error.cause);
      }
      if (!scope.isCancelled) {
        winner = index;
        scope.cancel();
      }
    }, logger);
  });

  try {
    await cancelled.promise;
    logger.debug(
      winner === undefined ? '[race] Cancelled before any task finished' : `[race] Task ${winner} won`,
    );
    return winner;
  } finally {
    cancelled.dispose();
  }
}

// =================================================================
// Section 2: All
// =================================================================

/**
 * Runs every task concurrently and resolves once all of them have finished.
 *
 * @throws {AggregatedFailure} If any task failed and no `onPanic` was given.
 */
export function all(tasks: readonly Task[], ...options: ExecutionOptions[]): Promise<void> {
  return forRange(0, tasks.length, (index, token) => tasks[index](token), ...options);
}

/**
 * `all` with early return when `token` fires. Tasks already running continue
 * unsupervised; inspect `token.err()` after it returns.
 */
export function allWithContext(
  token: CancellationToken,
  tasks: readonly Task[],
  ...options: ExecutionOptions[]
): Promise<void> {
  return forRangeWithContext(token, 0, tasks.length, (index, scope) => tasks[index](scope), ...options);
}

/**
 * `all` that reports task failures as a value instead of rejecting.
 */
export function allSettled(
  tasks: readonly Task[],
  ...options: ExecutionOptions[]
): Promise<Result<RangeReport, AggregatedFailure>> {
  return forRangeSettled(background(), 0, tasks.length, (index, token) => tasks[index](token), ...options);
}
