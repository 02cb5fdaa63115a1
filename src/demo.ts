import type { Logger } from 'pino';
import type { DemoConfig } from './config';
import { BinaryHeap } from './heap';

/**
 * Builds a heap over the configured values and empties it one root at a time,
 * logging the extracted values after every step.
 *
 * @returns the cumulative extraction after each step
 */
export function runDemo(config: DemoConfig, logger: Logger): number[][] {
  const heap = new BinaryHeap(config.values, { ordering: config.ordering });
  logger.info({ ordering: heap.ordering, heap: heap.toString() }, 'built heap');

  const steps: number[][] = [];
  const extracted: number[] = [];
  for (const value of heap.drain()) {
    extracted.push(value);
    steps.push(Array.from(extracted));
    logger.info({ step: steps.length, extracted }, 'extracted root');
  }
  return steps;
}
