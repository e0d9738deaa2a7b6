import { describe, it, expect, vi } from 'vitest';
import { InvalidOptionsError } from '../src/errors';
import { noopLogger } from '../src/logger';
import { resolveOptions } from '../src/options';

describe('resolveOptions', () => {
  it('should fall back to defaults when no options are given', () => {
    expect(resolveOptions([])).toEqual({
      workerCount: 0,
      onPanic: undefined,
      logger: noopLogger,
    });
  });

  it('should honour only the first options object', () => {
    const onPanic = vi.fn();
    const resolved = resolveOptions([{ workerCount: 2 }, { workerCount: 5, onPanic }]);

    expect(resolved.workerCount).toBe(2);
    expect(resolved.onPanic).toBeUndefined();
  });

  it('should reject a negative worker count', () => {
    expect(() => resolveOptions([{ workerCount: -1 }])).toThrow(
      'Invalid option "workerCount": must not be negative, got -1',
    );
  });

  it('should reject a worker count that is not an integer', () => {
    expect(() => resolveOptions([{ workerCount: 2.5 }])).toThrow(InvalidOptionsError);
    expect(() => resolveOptions([{ workerCount: Number.NaN }])).toThrow(
      'Invalid option "workerCount": expected an integer, got NaN',
    );
  });
});
