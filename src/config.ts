import dotenv from 'dotenv';
import { HeapError, Ordering, isOrdering } from './common';

const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Settings of the extraction demo. */
export interface DemoConfig {
  ordering: Ordering;
  values: number[];
  logLevel: LogLevel;
}

export const DEFAULT_VALUES: readonly number[] = [3, 10, 18, 5, 21, 100];

export function parseOrdering(raw: string | undefined): Ordering {
  if (raw == null || raw.trim() === '') {
    return Ordering.Min;
  }
  const value = raw.trim().toLowerCase();
  if (!isOrdering(value)) {
    throw new HeapError(
      `HEAP_ORDERING must be "max" or "min", got ${JSON.stringify(raw)}`
    );
  }
  return value;
}

export function parseValues(raw: string | undefined): number[] {
  if (raw == null || raw.trim() === '') {
    return Array.from(DEFAULT_VALUES);
  }
  return raw.split(',').map(token => {
    const trimmed = token.trim();
    const value = Number(trimmed);
    if (trimmed === '' || !Number.isFinite(value)) {
      throw new HeapError(
        `HEAP_VALUES must be comma-separated numbers, got ${JSON.stringify(token)}`
      );
    }
    return value;
  });
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  if (raw == null || raw.trim() === '') {
    return 'info';
  }
  const value = raw.trim().toLowerCase();
  if (!isLogLevel(value)) {
    throw new HeapError(
      `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got ${JSON.stringify(raw)}`
    );
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv): DemoConfig {
  return {
    ordering: parseOrdering(env.HEAP_ORDERING),
    values: parseValues(env.HEAP_VALUES),
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}

/** Loads `.env` into the process environment, then reads the demo settings from it. */
export function readConfig(): DemoConfig {
  dotenv.config();
  return loadConfig(process.env);
}
