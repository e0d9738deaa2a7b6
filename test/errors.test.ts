import { describe, it, expect, expectTypeOf } from 'vitest';
import {
  AggregatedFailure,
  CancellationError,
  CancelledError,
  CollectionShapeError,
  DeadlineExceededError,
  InvalidRangeError,
  UnitFailure,
  type UnitFailures,
  describeCause,
  tryCatch,
} from '../src/errors';

describe('Errors', () => {
  describe('UnitFailure', () => {
    it('should keep the raised value as its cause', () => {
      const failure = new UnitFailure(3, 'plain string');

      expect(failure.message).toBe('Unit 3 failed: plain string');
      expect(failure.cause).toBe('plain string');
      expect(failure.index).toBe(3);
      expect(failure.handled).toBe(false);
      expect(failure.name).toBe('UnitFailure');
    });

    it('should return a handled copy from markHandled', () => {
      const boom = new Error('boom');
      const failure = new UnitFailure(1, boom);
      const handled = failure.markHandled();

      expect(handled).not.toBe(failure);
      expect(handled.handled).toBe(true);
      expect(handled.cause).toBe(boom);
      expect(failure.handled).toBe(false);
    });
  });

  describe('AggregatedFailure', () => {
    it('should describe a single failure', () => {
      const aggregated = new AggregatedFailure([new UnitFailure(0, 'plain string')]);

      expect(aggregated.message).toBe('1 unit failed: Unit 0 failed: plain string');
      expect(aggregated).toBeInstanceOf(AggregateError);
    });

    it('should require at least one failure', () => {
      expectTypeOf(AggregatedFailure).constructorParameters.toEqualTypeOf<[UnitFailures]>();
      expectTypeOf<[]>().not.toMatchTypeOf<UnitFailures>();
    });

    it('should expose every failure and the last one as cause', () => {
      const a = new UnitFailure(1, new Error('a'));
      const b = new UnitFailure(3, new Error('b'));
      const aggregated = new AggregatedFailure([a, b]);

      expect(aggregated.message).toBe('2 units failed; last: Unit 3 failed: b');
      expect(aggregated.failures).toEqual([a, b]);
      expect(aggregated.errors).toEqual([a, b]);
      expect(aggregated.last).toBe(b);
      expect(aggregated.cause).toBe(b.cause);
    });
  });

  describe('cancellation errors', () => {
    it('should share a common base class', () => {
      expect(new CancelledError()).toBeInstanceOf(CancellationError);
      expect(new DeadlineExceededError(0)).toBeInstanceOf(CancellationError);
      expect(new DeadlineExceededError(0).message).toBe(
        'Deadline exceeded at 1970-01-01T00:00:00.000Z',
      );
    });
  });

  describe('usage errors', () => {
    it('should format range and shape errors', () => {
      expect(new InvalidRangeError(0, 1.5).message).toBe(
        'Range bounds must be safe integers, got [0, 1.5)',
      );
      expect(new CollectionShapeError('a Map', 'an array').message).toBe(
        'Expected a Map but received an array',
      );
    });
  });

  describe('describeCause', () => {
    it('should use the message of errors and stringify anything else', () => {
      expect(describeCause(new Error('x'))).toBe('x');
      expect(describeCause(42)).toBe('42');
      expect(describeCause(undefined)).toBe('undefined');
    });
  });

  describe('tryCatch', () => {
    it('should convert a returned value to Ok', async () => {
      const safeFn = tryCatch((x: number) => x * 2, (cause) => new UnitFailure(0, cause));
      const result = await safeFn(5);

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toBe(10);
      }
    });

    it('should convert a synchronous throw to Err', async () => {
      const safeFn = tryCatch(
        (): number => {
          throw new Error('sync');
        },
        (cause) => new UnitFailure(4, cause),
      );
      const result = await safeFn();

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toBe('Unit 4 failed: sync');
      }
    });

    it('should convert a rejection to Err', async () => {
      const safeFn = tryCatch(
        async () => {
          throw 'rejected';
        },
        (cause) => new UnitFailure(2, cause),
      );
      const result = await safeFn();

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.cause).toBe('rejected');
      }
    });
  });
});
