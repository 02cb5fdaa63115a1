import { Ordering, type HeapOptions } from './common';
import { compareValues, valuesEqual, type Ordered } from './compare';

/**
 * @category Data Structure
 * @summary Binary heap supporting both min-heap and max-heap orderings
 */
export interface Heap<E> {
  /** the ordering fixed at construction */
  readonly ordering: Ordering;
  /** whether the heap has no elements */
  get isEmpty(): boolean;
  /** the current number of elements */
  get length(): number;
  /** Peek at the highest priority element without removing it */
  peek(): E | undefined;
  /** Insert an element into the heap */
  insert(value: E): void;
  /** Remove and return the highest priority element */
  removeRoot(): E | undefined;
  /** Remove and return the element at an array position */
  removeAt(index: number): E | undefined;
  /** Add all the given elements and restore the heap property */
  merge(other: Iterable<E>): void;
  /** Position of a value in the backing array, or -1 */
  indexOf(value: E, from?: number): number;
  /** Copy of the backing array in heap order */
  toArray(): E[];
}

/**
 * Creates a new {@link Heap}, bulk-loading the given elements.
 *
 * @category Data Structure
 *
 * @example
 * ```typescript
 * const heap = newHeap([3, 10, 18, 5, 21, 100], { ordering: Ordering.Min });
 * heap.peek(); // 3
 * heap.insert(1);
 * heap.removeRoot(); // 1
 * ```
 */
export function newHeap<E extends Ordered<E>>(
  elements?: Iterable<E>,
  options?: HeapOptions
): BinaryHeap<E> {
  return new BinaryHeap(elements, options);
}

function leftChildIndex(parent: number): number {
  return 2 * parent + 1;
}

function rightChildIndex(parent: number): number {
  return 2 * parent + 2;
}

function parentIndex(child: number): number {
  return Math.floor((child - 1) / 2);
}

/**
 * Array-backed complete binary tree. The element at index `i` has children at `2i+1` and `2i+2`.
 *
 * | Method       | Complexity |
 * | ------------ | ---------- |
 * | constructor  | O(n)       |
 * | peek()       | O(1)       |
 * | insert()     | O(log n)   |
 * | removeRoot() | O(log n)   |
 * | removeAt()   | O(log n)   |
 * | merge()      | O(n)       |
 * | indexOf()    | O(n)       |
 *
 * @category Data Structure
 */
export class BinaryHeap<E extends Ordered<E>> implements Heap<E> {
  readonly #elements: E[];
  readonly ordering: Ordering;

  constructor(elements?: Iterable<E>, options?: HeapOptions) {
    this.#elements = elements == null ? [] : Array.from(elements);
    this.ordering = options?.ordering ?? Ordering.Max;
    this.#buildHeap();
  }

  get isEmpty(): boolean {
    return this.#elements.length === 0;
  }

  get length(): number {
    return this.#elements.length;
  }

  peek(): E | undefined {
    return this.#elements[0];
  }

  insert(value: E): void {
    this.#elements.push(value);
    this.#shiftUp(this.#elements.length - 1);
  }

  removeRoot(): E | undefined {
    if (this.#elements.length === 0) {
      return undefined;
    }
    this.#swap(0, this.#elements.length - 1);
    const value = this.#elements.pop();
    if (this.#elements.length > 0) {
      this.#shiftDown(0);
    }
    return value;
  }

  /**
   * Removes the element at an array position. Positions outside `[0, length - 1]` leave the heap untouched.
   *
   * The element moved into the hole may belong above or below it, so both shifts run.
   */
  removeAt(index: number): E | undefined {
    const lastIndex = this.#elements.length - 1;
    if (!Number.isInteger(index) || index < 0 || index > lastIndex) {
      return undefined;
    }
    if (index === lastIndex) {
      return this.#elements.pop();
    }
    this.#swap(index, lastIndex);
    const value = this.#elements.pop();
    this.#shiftDown(index);
    this.#shiftUp(index);
    return value;
  }

  /** Appends every element and rebuilds the whole heap, O(n) in the combined length. */
  merge(other: Iterable<E>): void {
    for (const value of other) {
      this.#elements.push(value);
    }
    this.#buildHeap();
  }

  /**
   * Searches the subtree rooted at `from` for a value equal to `value`.
   *
   * A subtree whose root has lower priority than `value` cannot contain it and is skipped.
   */
  indexOf(value: E, from = 0): number {
    if (!Number.isInteger(from) || from < 0 || from >= this.#elements.length) {
      return -1;
    }
    const current = this.#elements[from]!;
    if (this.#firstHasHigherPriority(value, current)) {
      return -1;
    }
    if (valuesEqual(value, current)) {
      return from;
    }
    const left = this.indexOf(value, leftChildIndex(from));
    if (left !== -1) {
      return left;
    }
    return this.indexOf(value, rightChildIndex(from));
  }

  toArray(): E[] {
    return Array.from(this.#elements);
  }

  /** Removes elements in priority order until the heap is empty. */
  *drain(): Generator<E, void, undefined> {
    let value = this.removeRoot();
    while (value !== undefined) {
      yield value;
      value = this.removeRoot();
    }
  }

  toString(): string {
    return `[${this.#elements.map(String).join(', ')}]`;
  }

  #buildHeap(): void {
    for (let i = Math.floor(this.#elements.length / 2) - 1; i >= 0; i--) {
      this.#shiftDown(i);
    }
  }

  #firstHasHigherPriority(a: E, b: E): boolean {
    const order = compareValues(a, b);
    return this.ordering === Ordering.Max ? order > 0 : order < 0;
  }

  /** index holding the higher priority element; an index past the end never wins */
  #higherPriority(indexA: number, indexB: number): number {
    const length = this.#elements.length;
    if (indexA >= length) {
      return indexB;
    }
    if (indexB >= length) {
      return indexA;
    }
    return this.#firstHasHigherPriority(
      this.#elements[indexA]!,
      this.#elements[indexB]!
    )
      ? indexA
      : indexB;
  }

  #shiftUp(index: number): void {
    let child = index;
    let parent = parentIndex(child);
    while (child > 0 && this.#higherPriority(child, parent) === child) {
      this.#swap(child, parent);
      child = parent;
      parent = parentIndex(child);
    }
  }

  #shiftDown(index: number): void {
    let parent = index;
    while (true) {
      let chosen = this.#higherPriority(leftChildIndex(parent), parent);
      chosen = this.#higherPriority(rightChildIndex(parent), chosen);
      if (chosen === parent) {
        return;
      }
      this.#swap(parent, chosen);
      parent = chosen;
    }
  }

  #swap(i: number, j: number): void {
    [this.#elements[i], this.#elements[j]] = [
      this.#elements[j]!,
      this.#elements[i]!,
    ];
  }
}
