import { InvalidOptionsError } from './errors';
import { type Logger, noopLogger } from './logger';

/**
 * Receives the raised value of every failing unit, together with its index.
 * May be invoked while other units are still running, so it must not assume
 * exclusive access to shared state.
 */
export type PanicHandler = (cause: unknown, index: number) => void;

/**
 * Per-call execution options. Nothing here is process-wide.
 */
export interface ExecutionOptions {
  /**
   * Number of long-lived workers to start. `0` spawns one worker per unit.
   * @default 0
   */
  workerCount?: number;
  /**
   * Takes unit failures. When set, failures are not surfaced to the caller.
   */
  onPanic?: PanicHandler;
  /**
   * @default noopLogger
   */
  logger?: Logger;
}

export interface ResolvedOptions {
  readonly workerCount: number;
  readonly onPanic: PanicHandler | undefined;
  readonly logger: Logger;
}

/**
 * Picks the options a call runs with. Only the first object is honoured;
 * later ones are ignored rather than merged field by field.
 *
 * @throws {InvalidOptionsError} If `workerCount` is negative or not an integer.
 */
export function resolveOptions(options: readonly ExecutionOptions[]): ResolvedOptions {
  const first: ExecutionOptions = options[0] ?? {};
  const workerCount = first.workerCount ?? 0;

  if (!Number.isSafeInteger(workerCount)) {
    throw new InvalidOptionsError('workerCount', `expected an integer, got ${workerCount}`);
  }
  if (workerCount < 0) {
    throw new InvalidOptionsError('workerCount', `must not be negative, got ${workerCount}`);
  }

  return {
    workerCount,
    onPanic: first.onPanic,
    logger: first.logger ?? noopLogger,
  };
}
