/**
 * @module
 * Async-local access to the unit currently executing. Code several calls deep
 * inside a unit body can read its index and cancellation token without having
 * them threaded through every signature.
 */

import { createContext as createUnctx } from 'unctx';
import { AsyncLocalStorage } from 'node:async_hooks';
import type { CancellationToken } from './cancellation';
import { UnitContextNotFoundError } from './errors';

export interface UnitContext {
  /** The index this unit was dispatched for. */
  readonly index: number;
  /** The cancellation scope of the scheduling call that dispatched the unit. */
  readonly token: CancellationToken;
  /** Shorthand for `token.signal`, ready to hand to `fetch` and friends. */
  readonly signal: AbortSignal;
}

const unitContext = createUnctx<UnitContext>({
  asyncContext: true,
  AsyncLocalStorage,
});

/**
 * Runs `fn` with `context` installed as the current unit context for its
 * whole asynchronous extent.
 */
export function runInUnitContext(
  context: UnitContext,
  fn: () => void | Promise<void>,
): Promise<void> {
  return unitContext.callAsync(context, async () => {
    await fn();
  });
}

/**
 * Retrieves the context of the unit currently executing.
 * @throws {UnitContextNotFoundError} If called outside of a unit body.
 */
export function getUnitContext(): UnitContext {
  const context = unitContext.tryUse();
  if (!context) throw new UnitContextNotFoundError();
  return context;
}

export function getUnitContextOrUndefined(): UnitContext | undefined {
  return unitContext.tryUse() ?? undefined;
}
