/**
 * @module
 * Collection adapters. Each entry point fixes, at compile time, which parts
 * of an item the callback receives, and maps unit indices onto a snapshot of
 * the collection taken before dispatch. They consume nothing but `forRange`.
 */

import type { CancellationToken } from './cancellation';
import { CollectionShapeError } from './errors';
import type { ExecutionOptions } from './options';
import { forRange } from './scheduler';

type Awaitable = void | Promise<void>;

/** A plain object used as a string-keyed record. */
export type RecordOf<V> = Readonly<Record<string, V>>;

/** Anything `repeatFor` can iterate. */
export type Collection = readonly unknown[] | ReadonlyMap<unknown, unknown> | RecordOf<unknown>;

function describeShape(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  if (typeof value !== 'object') return typeof value;
  if (isPlainObject(value)) return 'a plain object';
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  return typeof ctor === 'function' && ctor.name ? `a ${ctor.name}` : 'an object';
}

function isPlainObject(value: unknown): boolean {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isMap(value: unknown): boolean {
  return value instanceof Map;
}

function assertArray(value: unknown): asserts value is readonly unknown[] {
  if (!Array.isArray(value)) {
    throw new CollectionShapeError('an array', describeShape(value));
  }
}

/** Snapshots the entries of a `Map`, rejecting anything else. */
function mapEntries<K, V>(map: ReadonlyMap<K, V>): Array<[K, V]> {
  if (!isMap(map)) throw new CollectionShapeError('a Map', describeShape(map));
  return [...map.entries()];
}

/** Snapshots the own enumerable properties of a plain object. */
function recordEntries<V>(record: RecordOf<V>): Array<[string, V]> {
  if (!isPlainObject(record)) throw new CollectionShapeError('a plain object', describeShape(record));
  return Object.entries(record);
}

async function forEachPair<K, V>(
  entries: Array<[K, V]>,
  fn: (key: K, value: V, token: CancellationToken) => Awaitable,
  options: ExecutionOptions[],
): Promise<void> {
  await forRange(
    0,
    entries.length,
    (index, token) => {
      const [key, value] = entries[index];
      return fn(key, value, token);
    },
    ...options,
  );
}

function sizeOf(collection: Collection): number {
  if (Array.isArray(collection)) return collection.length;
  if (collection instanceof Map) return collection.size;
  if (isPlainObject(collection)) return Object.keys(collection).length;
  throw new CollectionShapeError('an array, a Map or a plain object', describeShape(collection));
}

// =================================================================
// Section 1: Arrays
// =================================================================

/**
 * Runs `fn` for every element of `items`, concurrently.
 *
 * @example
 * ```typescript
 * await forEach(users, async (user, i) => {
 *   profiles[i] = await loadProfile(user.id);
 * }, { workerCount: 4 });
 * ```
 */
export async function forEach<T>(
  items: readonly T[],
  fn: (element: T, index: number, token: CancellationToken) => Awaitable,
  ...options: ExecutionOptions[]
): Promise<void> {
  assertArray(items);
  const snapshot = [...items];
  await forRange(0, snapshot.length, (index, token) => fn(snapshot[index], index, token), ...options);
}

/** Runs `fn` for every index of `items`, concurrently. */
export async function forEachIndex(
  items: readonly unknown[],
  fn: (index: number, token: CancellationToken) => Awaitable,
  ...options: ExecutionOptions[]
): Promise<void> {
  assertArray(items);
  await forRange(0, items.length, fn, ...options);
}

// =================================================================
// Section 2: Maps and Records
// =================================================================

/** Runs `fn` for every key/value pair of `map`, concurrently. */
export async function forEachEntry<K, V>(
  map: ReadonlyMap<K, V>,
  fn: (key: K, value: V, token: CancellationToken) => Awaitable,
  ...options: ExecutionOptions[]
): Promise<void> {
  await forEachPair(mapEntries(map), fn, options);
}

/** Runs `fn` for every key of `map`, concurrently. */
export async function forEachKey<K>(
  map: ReadonlyMap<K, unknown>,
  fn: (key: K, token: CancellationToken) => Awaitable,
  ...options: ExecutionOptions[]
): Promise<void> {
  const keys = mapEntries(map).map(([key]) => key);
  await forRange(0, keys.length, (index, token) => fn(keys[index], token), ...options);
}

/**
 * Runs `fn` for every own enumerable property of a plain object, concurrently.
 *
 * @example
 * ```typescript
 * await forEachProperty({ a: 1, b: 2 }, (key, value) => {
 *   totals.set(key, value * 2);
 * });
 * ```
 */
export async function forEachProperty<V>(
  record: RecordOf<V>,
  fn: (key: string, value: V, token: CancellationToken) => Awaitable,
  ...options: ExecutionOptions[]
): Promise<void> {
  await forEachPair(recordEntries(record), fn, options);
}

// =================================================================
// Section 3: Any Collection
// =================================================================

/**
 * Runs `fn` once per item of any collection without passing the item.
 */
export async function repeatFor(
  collection: Collection,
  fn: (token: CancellationToken) => Awaitable,
  ...options: ExecutionOptions[]
): Promise<void> {
  await forRange(0, sizeOf(collection), (_, token) => fn(token), ...options);
}
