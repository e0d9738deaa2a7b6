import { describe, it, expect } from 'vitest';
import { ok, err } from 'neverthrow';
import { CompletionBarrier } from '../src/barrier';
import { BarrierError, UnitFailure } from '../src/errors';
import { flushMicrotasks } from './helpers';

describe('CompletionBarrier', () => {
  it('should release immediately for a count of zero', async () => {
    await expect(new CompletionBarrier(0).done).resolves.toEqual([]);
  });

  it('should release once every unit has arrived or been skipped', async () => {
    const barrier = new CompletionBarrier(3);
    let released = false;
    void barrier.done.then(() => {
      released = true;
    });

    barrier.arrive(ok(0));
    barrier.skip();
    await flushMicrotasks();

    expect(barrier.pending).toBe(1);
    expect(released).toBe(false);

    barrier.arrive(err(new UnitFailure(2, 'boom')));
    const outcomes = await barrier.done;

    expect(released).toBe(true);
    expect(outcomes).toHaveLength(2);
    expect(outcomes[0].isOk()).toBe(true);
    const second = outcomes[1];
    expect(second.isErr()).toBe(true);
    if (second.isErr()) {
      expect(second.error.index).toBe(2);
    }
  });

  it('should expose outcomes recorded so far as a copy', () => {
    const barrier = new CompletionBarrier(2);
    barrier.arrive(ok(7));

    const snapshot = barrier.snapshot();
    barrier.arrive(ok(8));

    expect(snapshot).toHaveLength(1);
    expect(barrier.snapshot()).toHaveLength(2);
  });

  it('should reject arrivals past its count', () => {
    const barrier = new CompletionBarrier(1);
    barrier.skip();

    expect(() => barrier.arrive(ok(0))).toThrow(BarrierError);
    expect(() => barrier.skip()).toThrow('Barrier already released');
  });

  it('should reject an invalid count', () => {
    expect(() => new CompletionBarrier(-1)).toThrow(BarrierError);
    expect(() => new CompletionBarrier(1.5)).toThrow(
      'Barrier count must be a non-negative integer, got 1.5',
    );
  });
});
