import { describe, expect, test } from 'vitest';
import {
  combineHeaps,
  isHeapArray,
  isMinHeap,
  isMinOrdering,
  nthLargest,
  nthSmallest,
  sortByPriority,
} from './algorithms';
import { Ordering } from './common';
import { BinaryHeap } from './heap';
import { randomIntegers, Version } from './test-helpers';

const integers = [3, 10, 18, 5, 21, 100];

describe('algorithms', () => {
  describe('nthSmallest', () => {
    test('returns the nth smallest value, 0-based', () => {
      expect(nthSmallest(integers, 0)).toBe(3);
      expect(nthSmallest(integers, 2)).toBe(10);
      expect(nthSmallest(integers, 5)).toBe(100);
    });

    test('does not read the array position after build-heap', () => {
      const heap = new BinaryHeap(integers, { ordering: Ordering.Min });
      expect(heap.toArray()[2]).toBe(18);
      expect(nthSmallest(integers, 2)).toBe(10);
    });

    test('returns undefined when there are not enough values', () => {
      expect(nthSmallest(integers, 6)).toBeUndefined();
      expect(nthSmallest(integers, -1)).toBeUndefined();
      expect(nthSmallest(integers, 1.5)).toBeUndefined();
      expect(nthSmallest<number>([], 0)).toBeUndefined();
    });

    test('leaves the input untouched', () => {
      const input = [9, 1, 5];
      nthSmallest(input, 1);
      expect(input).toEqual([9, 1, 5]);
    });
  });

  test('nthLargest mirrors nthSmallest', () => {
    expect(nthLargest(integers, 0)).toBe(100);
    expect(nthLargest(integers, 1)).toBe(21);
    expect(nthLargest(integers, 6)).toBeUndefined();
  });

  describe('combineHeaps', () => {
    test('uses the ordering of the first heap', () => {
      const a = new BinaryHeap([5, 1], { ordering: Ordering.Min });
      const b = new BinaryHeap([4, 2], { ordering: Ordering.Max });
      const combined = combineHeaps(a, b);
      expect(combined.ordering).toBe(Ordering.Min);
      expect(Array.from(combined.drain())).toEqual([1, 2, 4, 5]);
    });

    test('leaves both inputs intact', () => {
      const a = new BinaryHeap([5, 1]);
      const b = new BinaryHeap([4, 2]);
      combineHeaps(a, b);
      expect(a.toArray()).toEqual([5, 1]);
      expect(b.toArray()).toEqual([4, 2]);
    });
  });

  test('isMinOrdering only inspects the tag', () => {
    expect(isMinOrdering(Ordering.Min)).toBe(true);
    expect(isMinOrdering(Ordering.Max)).toBe(false);
  });

  describe('isMinHeap', () => {
    test('accepts trivial arrays', () => {
      expect(isMinHeap<number>([])).toBe(true);
      expect(isMinHeap([1])).toBe(true);
    });

    test('accepts valid min heaps', () => {
      expect(isMinHeap([1, 2, 3, 4, 5])).toBe(true);
      expect(isMinHeap([1, 1, 1])).toBe(true);
      expect(isMinHeap([3, 5, 18, 10, 21, 100])).toBe(true);
    });

    test('rejects a smaller left child', () => {
      expect(isMinHeap([2, 1])).toBe(false);
      expect(isMinHeap([1, 3, 2, 0])).toBe(false);
    });

    test('rejects a smaller right child', () => {
      expect(isMinHeap([1, 2, 0])).toBe(false);
    });
  });

  test('isHeapArray checks max ordering', () => {
    expect(isHeapArray([10, 5, 7, 1], Ordering.Max)).toBe(true);
    expect(isHeapArray([1, 5], Ordering.Max)).toBe(false);
    expect(isHeapArray(['b', 'a'], Ordering.Max)).toBe(true);
  });

  describe('sortByPriority', () => {
    test('sorts ascending for min and descending for max', () => {
      expect(sortByPriority([4, 1, 3])).toEqual([1, 3, 4]);
      expect(sortByPriority([4, 1, 3], Ordering.Max)).toEqual([4, 3, 1]);
    });

    test('reproduces the input multiset in order', () => {
      const values = randomIntegers(200, 50, 5);
      const heap = new BinaryHeap<number>([], { ordering: Ordering.Min });
      for (const value of values) {
        heap.insert(value);
      }
      const expected = Array.from(values).sort((a, b) => a - b);
      expect(Array.from(heap.drain())).toEqual(expected);
      expect(sortByPriority(values)).toEqual(expected);
      expect(sortByPriority(values, Ordering.Max)).toEqual(
        Array.from(expected).reverse()
      );
    });

    test('sorts Comparable elements', () => {
      const sorted = sortByPriority([
        new Version(2, 0),
        new Version(1, 1),
        new Version(1, 0),
      ]);
      expect(sorted.map(String)).toEqual(['v1.0', 'v1.1', 'v2.0']);
    });
  });
});
