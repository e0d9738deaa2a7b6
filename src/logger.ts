/**
 * Receives the scheduler's diagnostics. Pass `console`, a pino or winston
 * instance, or anything else with these four methods.
 *
 * Levels used by scheduling calls:
 * - `debug`: a range being dispatched or completed, a unit failure handed to
 *   `onPanic`, the outcome of a race.
 * - `info`: a call returning early because its token fired.
 * - `warn`: unit failures about to be surfaced as an `AggregatedFailure`.
 * - `error`: an `onPanic` handler that threw, or a worker that died outside
 *   any unit.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** The default logger: drops everything. */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
