/**
 * @module
 * Error types raised or carried by the scheduler, and the `Result` boundary
 * used to isolate unit failures. Expected per-unit failures travel as
 * `Result` values; only configuration mistakes and unhandled aggregated
 * failures are thrown.
 */

import { type Result, ok, err } from 'neverthrow';

// =================================================================
// Section 1: Unit Failures
// =================================================================

/**
 * Renders an arbitrary raised value for use inside an error message.
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

/**
 * The failure of a single unit. The raised value is kept verbatim in `cause`,
 * whether or not it was an `Error`.
 */
export class UnitFailure extends Error {
  public readonly index: number;
  /** True once an `onPanic` handler has taken the failure. */
  public readonly handled: boolean;

  constructor(index: number, cause: unknown, handled = false) {
    super(`Unit ${index} failed: ${describeCause(cause)}`, { cause });
    this.name = 'UnitFailure';
    this.index = index;
    this.handled = handled;
    Object.setPrototypeOf(this, UnitFailure.prototype);
  }

  /** Returns a copy of this failure marked as handled. */
  markHandled(): UnitFailure {
    return new UnitFailure(this.index, this.cause, true);
  }
}

/** At least one unit failure. */
export type UnitFailures = readonly [UnitFailure, ...UnitFailure[]];

/**
 * Every unhandled unit failure of one scheduling call. `last` is the failure
 * observed last, which is also exposed as `cause`.
 */
export class AggregatedFailure extends AggregateError {
  public readonly failures: UnitFailures;

  constructor(failures: UnitFailures) {
    const last = failures[failures.length - 1];
    super(
      failures,
      failures.length === 1
        ? `1 unit failed: ${last.message}`
        : `${failures.length} units failed; last: ${last.message}`,
      { cause: last.cause },
    );
    this.name = 'AggregatedFailure';
    this.failures = failures;
    Object.setPrototypeOf(this, AggregatedFailure.prototype);
  }

  get last(): UnitFailure {
    return this.failures[this.failures.length - 1];
  }
}

// =================================================================
// Section 2: Cancellation
// =================================================================

/**
 * Base class of the errors a fired `CancellationToken` reports from `err()`.
 */
export class CancellationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CancellationError';
    Object.setPrototypeOf(this, CancellationError.prototype);
  }
}

/** The token was cancelled explicitly. */
export class CancelledError extends CancellationError {
  constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'CancelledError';
    Object.setPrototypeOf(this, CancelledError.prototype);
  }
}

/** The token's deadline elapsed. */
export class DeadlineExceededError extends CancellationError {
  public readonly deadline: number;

  constructor(deadline: number) {
    super(`Deadline exceeded at ${new Date(deadline).toISOString()}`);
    this.name = 'DeadlineExceededError';
    this.deadline = deadline;
    Object.setPrototypeOf(this, DeadlineExceededError.prototype);
  }
}

// =================================================================
// Section 3: Usage Errors
// =================================================================

export class InvalidRangeError extends Error {
  public readonly begin: number;
  public readonly end: number;

  constructor(begin: number, end: number) {
    super(`Range bounds must be safe integers, got [${begin}, ${end})`);
    this.name = 'InvalidRangeError';
    this.begin = begin;
    this.end = end;
    Object.setPrototypeOf(this, InvalidRangeError.prototype);
  }
}

export class InvalidOptionsError extends Error {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid option "${field}": ${message}`);
    this.name = 'InvalidOptionsError';
    this.field = field;
    Object.setPrototypeOf(this, InvalidOptionsError.prototype);
  }
}

/**
 * A collection adapter received a value whose runtime shape does not match
 * the entry point it was passed to.
 */
export class CollectionShapeError extends Error {
  public readonly expected: string;
  public readonly received: string;

  constructor(expected: string, received: string) {
    super(`Expected ${expected} but received ${received}`);
    this.name = 'CollectionShapeError';
    this.expected = expected;
    this.received = received;
    Object.setPrototypeOf(this, CollectionShapeError.prototype);
  }
}

export class ChannelClosedError extends Error {
  constructor() {
    super('Send on closed channel');
    this.name = 'ChannelClosedError';
    Object.setPrototypeOf(this, ChannelClosedError.prototype);
  }
}

export class BarrierError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BarrierError';
    Object.setPrototypeOf(this, BarrierError.prototype);
  }
}

export class UnitContextNotFoundError extends Error {
  constructor(
    message = 'Unit context not found. Ensure getUnitContext() is called from inside a unit body.',
  ) {
    super(message);
    this.name = 'UnitContextNotFoundError';
    Object.setPrototypeOf(this, UnitContextNotFoundError.prototype);
  }
}

// =================================================================
// Section 4: Result-based Error Handling Utility (`tryCatch`)
// =================================================================

/**
 * Safely wraps a function (synchronous or asynchronous) that may throw,
 * converting its outcome into a `Promise<Result<T, E>>`. The returned function
 * never throws or rejects; a synchronous throw is captured the same way as a
 * rejection.
 *
 * @example
 * ```typescript
 * const safeParse = tryCatch(
 *   (text: string) => JSON.parse(text) as unknown,
 *   (cause) => new UnitFailure(0, cause),
 * );
 * const result = await safeParse('invalid json'); // Err(UnitFailure)
 * ```
 */
export function tryCatch<T, TArgs extends unknown[], E>(
  fn: (...args: TArgs) => T | Promise<T>,
  mapError: (caughtError: unknown) => E,
): (...args: TArgs) => Promise<Result<T, E>> {
  return async (...args: TArgs): Promise<Result<T, E>> => {
    try {
      const result = await fn(...args);
      return ok(result);
    } catch (error) {
      return err(mapError(error));
    }
  };
}
