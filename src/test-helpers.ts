import type { DestinationStream } from 'pino';
import { expect } from 'vitest';
import { isHeapArray } from './algorithms';
import type { Comparable, Ordered } from './compare';
import type { Heap } from './heap';

/**
 * Deterministic pseudo random generator (mulberry32) so that randomized tests are reproducible.
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** `count` integers in `[0, max)` */
export function randomIntegers(
  count: number,
  max: number,
  seed: number
): number[] {
  const random = seededRandom(seed);
  return Array.from({ length: count }, () => Math.floor(random() * max));
}

export function expectHeapProperty<E extends Ordered<E>>(
  heap: Heap<E>
): void {
  expect(isHeapArray(heap.toArray(), heap.ordering)).toBe(true);
}

/** Element type implementing {@link Comparable}, ordered by major then minor. */
export class Version implements Comparable<Version> {
  constructor(
    readonly major: number,
    readonly minor: number
  ) {}

  compareTo(other: Version): number {
    if (this.major !== other.major) return this.major - other.major;
    return this.minor - other.minor;
  }

  equals(other: Version): boolean {
    return this.major === other.major && this.minor === other.minor;
  }

  toString(): string {
    return `v${this.major}.${this.minor}`;
  }
}

/** pino destination that keeps every log line as a parsed object. */
export function collectLines(): {
  destination: DestinationStream;
  lines: Record<string, unknown>[];
} {
  const lines: Record<string, unknown>[] = [];
  return {
    lines,
    destination: {
      write(msg: string) {
        const parsed: Record<string, unknown> = JSON.parse(msg);
        lines.push(parsed);
      },
    },
  };
}
