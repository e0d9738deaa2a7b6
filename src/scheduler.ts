/**
 * @module
 * The range scheduler: runs a per-index function over every integer of
 * `[begin, end)` on concurrently scheduled workers, isolates unit failures,
 * and waits at a completion barrier or until the caller's token fires.
 *
 * Two execution modes are selected by `workerCount`:
 * - `0` (default): one worker is spawned per index. No queueing.
 * - `K > 0`: exactly K long-lived workers read indices from an unbuffered
 *   handoff channel. The dispatcher waits on each handoff, which is the only
 *   backpressure point.
 *
 * **Caveat on cancellation.** Cancellation is cooperative. When the token
 * handed to `forRangeWithContext` fires, the call stops dispatching and
 * returns, but units that have already started keep running unsupervised in
 * the background and may still write into caller-owned data after the call
 * has returned. Unit bodies that must stop should watch the token they are
 * given (or `getUnitContext().signal`).
 */

import { type Result, ok, err } from 'neverthrow';
import { type CancellationToken, background } from './cancellation';
import { CompletionBarrier, type UnitOutcome } from './barrier';
import { HandoffChannel } from './channel';
import { type UnitContext, runInUnitContext } from './context';
import {
  AggregatedFailure,
  ChannelClosedError,
  InvalidRangeError,
  UnitFailure,
  tryCatch,
} from './errors';
import type { Logger } from './logger';
import { type ExecutionOptions, type ResolvedOptions, resolveOptions } from './options';

// =================================================================
// Section 1: Core Types
// =================================================================

/**
 * The body run for each index. `token` is the scheduling call's own scope: it
 * fires when the caller's token fires and once the call has returned.
 */
export type IndexFn = (index: number, token: CancellationToken) => void | Promise<void>;

/**
 * What a scheduling call observed by the time it returned.
 */
export interface RangeReport {
  /** `end - begin`, or 0 for an empty range. */
  readonly length: number;
  /** Units that started executing. */
  readonly dispatched: number;
  /** Units that finished, normally or by failing. */
  readonly completed: number;
  /** Every unit failure observed, handled or not, in arrival order. */
  readonly failures: readonly UnitFailure[];
  /** True when the call returned because its token fired. */
  readonly detached: boolean;
}

/**
 * Defers `callback` to its own macrotask, so no unit body ever runs on the
 * caller's stack. Unit bodies are already isolated; a rejection reaching here
 * is a scheduler fault and is logged.
 */
export function spawn(callback: () => Promise<void>, logger: Logger): void {
  setTimeout(() => {
    callback().catch((error: unknown) => {
      logger.error('[spawn] Worker terminated unexpectedly', error);
    });
  }, 0);
}

// =================================================================
// Section 2: Unit Execution
// =================================================================

/**
 * Runs one unit inside its unit context and converts whatever it raises into
 * an outcome. A failure is offered to `onPanic` when one is set; if the
 * handler itself throws, the failure stays unhandled.
 * @internal
 */
export async function executeUnit(
  index: number,
  fn: IndexFn,
  scope: CancellationToken,
  options: ResolvedOptions,
): Promise<UnitOutcome> {
  const context: UnitContext = { index, token: scope, signal: scope.signal };
  const outcome = await tryCatch(
    () => runInUnitContext(context, () => fn(index, scope)),
    (cause) => new UnitFailure(index, cause),
  )();
  if (outcome.isOk()) return ok(index);

  const failure = outcome.error;
  const { onPanic, logger } = options;
  if (!onPanic) return err(failure);

  logger.debug(`[forRange] Unit ${index} failed; passing to onPanic`, failure.cause);
  try {
    onPanic(failure.cause, index);
    return err(failure.markHandled());
  } catch (handlerError) {
    logger.error(`[forRange] onPanic threw while handling unit ${index}`, handlerError);
    return err(failure);
  }
}

// =================================================================
// Section 3: Dispatch Strategies
// =================================================================

type UnitRunner = (index: number) => Promise<void>;

function dispatchUnbounded(begin: number, end: number, runUnit: UnitRunner, logger: Logger): void {
  for (let index = begin; index < end; index++) {
    spawn(() => runUnit(index), logger);
  }
}

/**
 * Starts `workerCount` workers draining a handoff channel, then a dispatcher
 * feeding it indices in order. Indices the dispatcher never hands over,
 * because the scope fired or the channel closed, are skipped at the barrier.
 */
function dispatchBounded(
  begin: number,
  end: number,
  workerCount: number,
  runUnit: UnitRunner,
  barrier: CompletionBarrier,
  scope: CancellationToken,
  logger: Logger,
): HandoffChannel<number> {
  const channel = new HandoffChannel<number>();

  for (let worker = 0; worker < workerCount; worker++) {
    spawn(async () => {
      for await (const index of channel) {
        await runUnit(index);
      }
    }, logger);
  }

  spawn(async () => {
    let next = begin;
    try {
      for (; next < end && !scope.isCancelled; next++) {
        await channel.send(next);
      }
    } catch (error) {
      if (!(error instanceof ChannelClosedError)) throw error;
    }
    for (; next < end; next++) barrier.skip();
  }, logger);

  return channel;
}

// =================================================================
// Section 4: Public Entry Points
// =================================================================

/**
 * Core of the range scheduler. Runs `fn` for every index of `[begin, end)`
 * and resolves once every unit has finished or `token` has fired.
 *
 * Unit failures never reject the returned promise. Without an `onPanic`
 * handler, a completed call with failures resolves to
 * `Err(AggregatedFailure)` listing all of them; a detached call always
 * resolves to `Ok`, with what it saw so far in the report.
 *
 * @throws {InvalidRangeError} If `begin` or `end` is not a safe integer.
 * @throws {InvalidOptionsError} If the first options object is invalid.
 */
export async function forRangeSettled(
  token: CancellationToken,
  begin: number,
  end: number,
  fn: IndexFn,
  ...options: ExecutionOptions[]
): Promise<Result<RangeReport, AggregatedFailure>> {
  if (!Number.isSafeInteger(begin) || !Number.isSafeInteger(end)) {
    throw new InvalidRangeError(begin, end);
  }
  const resolved = resolveOptions(options);
  const { logger, workerCount } = resolved;

  const length = Math.max(0, end - begin);
  if (length === 0) {
    return ok({ length: 0, dispatched: 0, completed: 0, failures: [], detached: false });
  }

  const scope = token.child();
  const barrier = new CompletionBarrier(length);
  let dispatched = 0;

  const runUnit: UnitRunner = async (index) => {
    if (scope.isCancelled) {
      barrier.skip();
      return;
    }
    dispatched++;
    barrier.arrive(await executeUnit(index, fn, scope, resolved));
  };

  const cancelled = scope.whenCancelled();
  let channel: HandoffChannel<number> | undefined;

  try {
    if (scope.isCancelled) {
      logger.info(`[forRange] Token already fired; nothing dispatched over [${begin}, ${end})`);
      return ok({ length, dispatched: 0, completed: 0, failures: [], detached: true });
    }

    logger.debug(
      `[forRange] Dispatching ${length} units over [${begin}, ${end}) ` +
        (workerCount > 0 ? `on ${workerCount} workers` : 'unbounded'),
    );
    if (workerCount > 0) {
      channel = dispatchBounded(begin, end, workerCount, runUnit, barrier, scope, logger);
    } else {
      dispatchUnbounded(begin, end, runUnit, logger);
    }

    const settled = await Promise.race([
      barrier.done.then((outcomes) => ({ detached: false, outcomes })),
      cancelled.promise.then(() => ({ detached: true, outcomes: barrier.snapshot() })),
    ]);

    const failures = settled.outcomes.flatMap((outcome) => (outcome.isErr() ? [outcome.error] : []));
    const report: RangeReport = {
      length,
      dispatched,
      completed: settled.outcomes.length,
      failures,
      detached: settled.detached,
    };

    if (report.detached) {
      logger.info(
        `[forRange] Token fired after ${report.completed}/${length} units; ` +
          `${dispatched - report.completed} still running detached`,
        scope.err(),
      );
      return ok(report);
    }

    const [first, ...rest] = failures.filter((failure) => !failure.handled);
    if (first) {
      logger.warn(`[forRange] ${rest.length + 1} of ${length} units failed without a handler`);
      return err(new AggregatedFailure([first, ...rest]));
    }

    logger.debug(`[forRange] Completed ${length} units over [${begin}, ${end})`);
    return ok(report);
  } finally {
    cancelled.dispose();
    scope.cancel();
    channel?.close();
  }
}

/**
 * Invokes `fn` exactly once for every integer in `[begin, end)`, concurrently
 * and in no particular order, and resolves once all of them have finished.
 * An empty range (`end <= begin`) resolves immediately.
 *
 * `fn` may close over caller data. Writing to disjoint slots (`results[i] = …`)
 * is safe; accumulating into a shared variable across awaits is not.
 *
 * @throws {AggregatedFailure} If any unit failed and no `onPanic` was given.
 *
 * @example
 * ```typescript
 * const sizes = new Array<number>(files.length);
 * await forRange(0, files.length, async (i) => {
 *   sizes[i] = (await stat(files[i])).size;
 * }, { workerCount: 8 });
 * ```
 */
export async function forRange(
  begin: number,
  end: number,
  fn: IndexFn,
  ...options: ExecutionOptions[]
): Promise<void> {
  const result = await forRangeSettled(background(), begin, end, fn, ...options);
  if (result.isErr()) throw result.error;
}

/**
 * Like `forRange`, but returns early, without raising, when `token` fires.
 * Check `token.err()` afterwards to tell a cancelled call from a completed
 * one. See the module notes: units already running are not stopped.
 *
 * @throws {AggregatedFailure} If the call completed, a unit failed and no
 *         `onPanic` was given.
 */
export async function forRangeWithContext(
  token: CancellationToken,
  begin: number,
  end: number,
  fn: IndexFn,
  ...options: ExecutionOptions[]
): Promise<void> {
  const result = await forRangeSettled(token, begin, end, fn, ...options);
  if (result.isErr()) throw result.error;
}
