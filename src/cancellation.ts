/**
 * @module
 * One-shot cancellation tokens with optional deadlines. A token is fired at
 * most once, by `cancel()`, by its deadline elapsing, or by its parent firing,
 * and never un-fires. There is no process-wide token: every top-level call
 * that is not handed one builds a fresh `background()` root.
 */

import {
  CancellationError,
  CancelledError,
  DeadlineExceededError,
  InvalidOptionsError,
} from './errors';

export type CancelCallback = (reason: CancellationError) => void;

export class CancellationToken {
  private reason: CancellationError | undefined;
  private readonly callbacks = new Set<CancelCallback>();
  private readonly controller = new AbortController();
  private timer: ReturnType<typeof setTimeout> | undefined;
  private detachFromParent: (() => void) | undefined;

  /** Epoch milliseconds after which the token fires, if it has a deadline. */
  readonly deadline: number | undefined;

  /**
   * @throws {InvalidOptionsError} If `deadline` is given but is not a finite
   *         number of milliseconds.
   */
  constructor(parent?: CancellationToken, deadline?: number) {
    if (deadline !== undefined && !Number.isFinite(deadline)) {
      throw new InvalidOptionsError('deadline', `expected a finite time, got ${deadline}`);
    }
    this.deadline = earliest(parent?.deadline, deadline);

    const parentReason = parent?.err();
    if (parentReason) {
      this.fire(parentReason);
      return;
    }
    if (parent) {
      this.detachFromParent = parent.onCancel((reason) => this.fire(reason));
    }

    // Only arm a timer for a deadline this token introduces; an inherited
    // one arrives through the parent.
    if (deadline !== undefined && this.deadline === deadline) {
      const at = deadline;
      const delay = at - Date.now();
      if (delay <= 0) {
        this.fire(new DeadlineExceededError(at));
        return;
      }
      this.timer = setTimeout(() => this.fire(new DeadlineExceededError(at)), delay);
    }
  }

  get isCancelled(): boolean {
    return this.reason !== undefined;
  }

  /**
   * `undefined` while the token is live, otherwise the error describing why
   * it fired.
   */
  err(): CancellationError | undefined {
    return this.reason;
  }

  /** An `AbortSignal` that aborts with `err()` when the token fires. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Registers `callback` to run when the token fires. If it already has, the
   * callback runs immediately. Returns a function that unregisters it.
   */
  onCancel(callback: CancelCallback): () => void {
    if (this.reason) {
      callback(this.reason);
      return () => {};
    }
    this.callbacks.add(callback);
    return () => {
      this.callbacks.delete(callback);
    };
  }

  /**
   * Resolves with the cancellation error once the token fires. The returned
   * `dispose` detaches the listener for callers that stop waiting first.
   */
  whenCancelled(): { promise: Promise<CancellationError>; dispose: () => void } {
    let dispose: () => void = () => {};
    const promise = new Promise<CancellationError>((resolve) => {
      dispose = this.onCancel(resolve);
    });
    return { promise, dispose };
  }

  cancel(reason: CancellationError = new CancelledError()): void {
    this.fire(reason);
  }

  child(): CancellationToken {
    return new CancellationToken(this);
  }

  private fire(reason: CancellationError): void {
    if (this.reason) return;
    this.reason = reason;
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.detachFromParent?.();
    this.detachFromParent = undefined;
    this.controller.abort(reason);

    const callbacks = [...this.callbacks];
    this.callbacks.clear();
    for (const callback of callbacks) callback(reason);
  }
}

function earliest(a: number | undefined, b: number | undefined): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.min(a, b);
}

/** A fresh, never-expiring root token. */
export function background(): CancellationToken {
  return new CancellationToken();
}

export function withCancel(parent: CancellationToken = background()): CancellationToken {
  return new CancellationToken(parent);
}

/**
 * Derives a token that fires at `deadline` (a `Date` or epoch milliseconds),
 * or earlier if `parent` fires first. Until it fires, its timer keeps the
 * process alive.
 *
 * @throws {InvalidOptionsError} For an invalid `Date` or a non-finite number.
 */
export function withDeadline(parent: CancellationToken, deadline: Date | number): CancellationToken {
  return new CancellationToken(parent, typeof deadline === 'number' ? deadline : deadline.getTime());
}

/**
 * Derives a token that fires `timeoutMs` milliseconds from now.
 *
 * @example
 * ```typescript
 * const token = withTimeout(background(), 100);
 * await forRangeWithContext(token, 0, urls.length, fetchOne);
 * if (token.err() instanceof DeadlineExceededError) {
 *   // some units may still be running
 * }
 * ```
 */
export function withTimeout(parent: CancellationToken, timeoutMs: number): CancellationToken {
  return withDeadline(parent, Date.now() + timeoutMs);
}
