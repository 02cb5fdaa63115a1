import { HeapError } from './common';
import { readConfig } from './config';
import { runDemo } from './demo';
import { createLogger } from './logger';

try {
  const config = readConfig();
  runDemo(config, createLogger(config.logLevel));
} catch (error) {
  if (!(error instanceof HeapError)) {
    throw error;
  }
  createLogger('error').error({ err: error }, 'invalid demo configuration');
  process.exitCode = 1;
}
