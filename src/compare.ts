import { HeapError } from './common';

/**
 * Capability of an element type to be totally ordered.
 *
 * @category Common
 */
export interface Comparable<T> {
  /** negative if this < other, positive if this > other, zero if they are equivalent */
  compareTo(other: T): number;
  /** value equality used by searches. Identity is used when absent. */
  equals?(other: T): boolean;
}

type Scalar = number | string | bigint | Date;

/**
 * Element types a heap accepts: built-in scalars, or objects implementing {@link Comparable}.
 *
 * @category Common
 */
export type Ordered<T> = Scalar | Comparable<T>;

function isScalar(value: unknown): value is Scalar {
  return (
    typeof value === 'number' ||
    typeof value === 'string' ||
    typeof value === 'bigint' ||
    value instanceof Date
  );
}

function isComparable(value: unknown): value is Comparable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'compareTo' in value &&
    typeof value.compareTo === 'function'
  );
}

function describe(value: unknown): string {
  if (value instanceof Date) {
    return `Date(${value.getTime()})`;
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'object') {
    return value === null ? 'null' : value.constructor.name;
  }
  return String(value);
}

function compareScalars(a: Scalar, b: Scalar): number {
  const x = a instanceof Date ? a.getTime() : a;
  const y = b instanceof Date ? b.getTime() : b;
  if (typeof x === 'string' && typeof y === 'string') {
    return x < y ? -1 : x > y ? 1 : 0;
  }
  if (typeof x !== 'string' && typeof y !== 'string') {
    if (Number.isNaN(x) || Number.isNaN(y)) {
      throw new HeapError(
        `NaN has no position in a total order: ${describe(a)} vs ${describe(b)}`
      );
    }
    return x < y ? -1 : x > y ? 1 : 0;
  }
  throw new HeapError(`cannot compare ${describe(a)} with ${describe(b)}`);
}

/**
 * Compares two values by their natural total order.
 *
 * Numbers and bigints compare numerically, strings by code unit, dates by timestamp,
 * and {@link Comparable} objects through `compareTo`.
 *
 * @throws {@link HeapError} when the values are not mutually comparable.
 */
export function compareValues<T extends Ordered<T>>(a: T, b: T): number {
  if (isScalar(a) && isScalar(b)) {
    return compareScalars(a, b);
  }
  if (isComparable(a) && isComparable(b)) {
    const order = a.compareTo(b);
    if (Number.isNaN(order)) {
      throw new HeapError(
        `compareTo returned NaN: ${describe(a)} vs ${describe(b)}`
      );
    }
    return order;
  }
  throw new HeapError(`cannot compare ${describe(a)} with ${describe(b)}`);
}

/** Value equality: dates by timestamp, `Comparable.equals` when defined, identity otherwise. */
export function valuesEqual<T extends Ordered<T>>(a: T, b: T): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  if (isComparable(a) && typeof a.equals === 'function') {
    return a.equals(b);
  }
  return a === b;
}
