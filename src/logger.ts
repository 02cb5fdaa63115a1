import pino, {
  type DestinationStream,
  type Logger,
  type LoggerOptions,
} from 'pino';
import type { LogLevel } from './config';

/** Creates the demo logger. Without a destination it writes JSON lines to stdout. */
export function createLogger(
  level: LogLevel,
  destination?: DestinationStream
): Logger {
  const options: LoggerOptions = {
    level,
    base: null, // no pid and hostname
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return destination ? pino(options, destination) : pino(options);
}
