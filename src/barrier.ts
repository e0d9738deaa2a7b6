import type { Result } from 'neverthrow';
import { BarrierError, type UnitFailure } from './errors';

/**
 * The outcome of one unit: `ok(index)` when its body returned, `err(failure)`
 * when it raised.
 */
export type UnitOutcome = Result<number, UnitFailure>;

/**
 * Counts outstanding units of one scheduling call. Every unit either arrives
 * with its outcome or is skipped because it was abandoned before starting;
 * `done` resolves exactly once, when the count reaches zero.
 */
export class CompletionBarrier {
  private outstanding: number;
  private readonly outcomes: UnitOutcome[] = [];
  private readonly release: (outcomes: readonly UnitOutcome[]) => void;

  readonly done: Promise<readonly UnitOutcome[]>;

  constructor(count: number) {
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new BarrierError(`Barrier count must be a non-negative integer, got ${count}`);
    }
    this.outstanding = count;

    let release: (outcomes: readonly UnitOutcome[]) => void = () => {};
    this.done = new Promise((resolve) => {
      release = resolve;
    });
    this.release = release;

    if (count === 0) this.release(this.outcomes);
  }

  /** Units not yet arrived or skipped. */
  get pending(): number {
    return this.outstanding;
  }

  /** Outcomes recorded so far, in arrival order. */
  snapshot(): readonly UnitOutcome[] {
    return [...this.outcomes];
  }

  arrive(outcome: UnitOutcome): void {
    this.countDown();
    this.outcomes.push(outcome);
    if (this.outstanding === 0) this.release(this.outcomes);
  }

  skip(): void {
    this.countDown();
    if (this.outstanding === 0) this.release(this.outcomes);
  }

  private countDown(): void {
    if (this.outstanding === 0) {
      throw new BarrierError('Barrier already released');
    }
    this.outstanding--;
  }
}
