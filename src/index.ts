/**
 * @categoryDescription Data Structure
 * Binary heap (priority queue) with max and min orderings.
 * @module
 */
export { newHeap, BinaryHeap, type Heap } from './heap';
export {
  HeapError,
  Ordering,
  isOrdering,
  type HeapOptions,
} from './common';
export {
  compareValues,
  valuesEqual,
  type Comparable,
  type Ordered,
} from './compare';
export {
  nthSmallest,
  nthLargest,
  combineHeaps,
  isMinOrdering,
  isHeapArray,
  isMinHeap,
  sortByPriority,
} from './algorithms';
