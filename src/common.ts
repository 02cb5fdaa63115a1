/**
 * @categoryDescription Common
 * Common functions and types.
 * @module
 */

/**
 * Base error class for all heapq errors.
 *
 * Heap operations report empty heaps and out-of-range indices by returning `undefined`;
 * this error is only raised when values cannot be ordered or configuration is malformed.
 */
export class HeapError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'HeapError';
  }
}

/**
 * Ordering of a heap. In a max heap larger values have higher priority, in a min heap smaller ones do.
 *
 * @category Common
 */
export const Ordering = {
  Max: 'max',
  Min: 'min',
} as const;

/** @category Common */
export type Ordering = (typeof Ordering)[keyof typeof Ordering];

/**
 * Options for constructing a heap.
 *
 * @category Common
 */
export interface HeapOptions {
  /** the ordering of the heap. Defaults to {@link Ordering.Max}. */
  ordering?: Ordering;
}

export function isOrdering(value: unknown): value is Ordering {
  return value === Ordering.Max || value === Ordering.Min;
}
