import { vi } from 'vitest';
import type { Logger } from '../src/logger';

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Lets pending promise continuations run without advancing any timer. */
export async function flushMicrotasks(rounds = 20): Promise<void> {
  for (let i = 0; i < rounds; i++) await Promise.resolve();
}

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

/**
 * A unit body that sleeps for `ms` and records how many bodies were running
 * at once.
 */
export function trackConcurrency(ms: number) {
  let active = 0;
  let peak = 0;
  return {
    body: async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(ms);
      active--;
    },
    get peak() {
      return peak;
    },
  };
}
