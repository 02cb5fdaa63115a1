/**
 * @categoryDescription Algorithms
 * Selection, validation and sorting built on {@link BinaryHeap}.
 * @module
 */
import { Ordering } from './common';
import { compareValues, type Ordered } from './compare';
import { BinaryHeap, type Heap } from './heap';

function nthByPriority<E extends Ordered<E>>(
  values: Iterable<E>,
  nth: number,
  ordering: Ordering
): E | undefined {
  if (!Number.isInteger(nth) || nth < 0) {
    return undefined;
  }
  const heap = new BinaryHeap(values, { ordering });
  // only the root is guaranteed after build-heap, so remove nth + 1 times
  let value: E | undefined;
  for (let i = 0; i <= nth; i++) {
    value = heap.removeRoot();
    if (value === undefined) {
      return undefined;
    }
  }
  return value;
}

/**
 * Returns the `nth` smallest value (0-based), or undefined if there are not enough values.
 *
 * @category Algorithms
 *
 * @example
 * ```typescript
 * nthSmallest([3, 10, 18, 5, 21, 100], 2); // 10
 * ```
 */
export function nthSmallest<E extends Ordered<E>>(
  values: Iterable<E>,
  nth: number
): E | undefined {
  return nthByPriority(values, nth, Ordering.Min);
}

/**
 * Returns the `nth` largest value (0-based), or undefined if there are not enough values.
 *
 * @category Algorithms
 */
export function nthLargest<E extends Ordered<E>>(
  values: Iterable<E>,
  nth: number
): E | undefined {
  return nthByPriority(values, nth, Ordering.Max);
}

/**
 * Creates a new heap holding the elements of both heaps, with the ordering of `a`.
 * Neither input is modified.
 *
 * @category Algorithms
 */
export function combineHeaps<E extends Ordered<E>>(
  a: Heap<E>,
  b: Heap<E>
): BinaryHeap<E> {
  return new BinaryHeap(a.toArray().concat(b.toArray()), {
    ordering: a.ordering,
  });
}

/**
 * Shallow check of an ordering tag. It does not inspect any heap contents; see {@link isMinHeap}.
 *
 * @category Algorithms
 */
export function isMinOrdering(ordering: Ordering): boolean {
  return ordering === Ordering.Min;
}

/**
 * Checks whether an array satisfies the heap property for the given ordering. O(n).
 *
 * @category Algorithms
 */
export function isHeapArray<E extends Ordered<E>>(
  elements: readonly E[],
  ordering: Ordering = Ordering.Min
): boolean {
  // a child outranking its parent breaks the property
  const outranks = (child: E, parent: E): boolean => {
    const order = compareValues(child, parent);
    return ordering === Ordering.Max ? order > 0 : order < 0;
  };
  for (let index = Math.floor(elements.length / 2) - 1; index >= 0; index--) {
    const parent = elements[index]!;
    const left = elements[2 * index + 1];
    const right = elements[2 * index + 2];
    if (left !== undefined && outranks(left, parent)) {
      return false;
    }
    if (right !== undefined && outranks(right, parent)) {
      return false;
    }
  }
  return true;
}

/**
 * Checks whether every parent in the array is less than or equal to its children.
 *
 * @category Algorithms
 */
export function isMinHeap<E extends Ordered<E>>(
  elements: readonly E[]
): boolean {
  return isHeapArray(elements, Ordering.Min);
}

/**
 * Returns the values in priority order: ascending for a min ordering, descending for max.
 *
 * @category Algorithms
 */
export function sortByPriority<E extends Ordered<E>>(
  values: Iterable<E>,
  ordering: Ordering = Ordering.Min
): E[] {
  return Array.from(new BinaryHeap(values, { ordering }).drain());
}
