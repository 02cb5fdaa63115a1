import { describe, expect, test } from 'vitest';
import { createLogger } from './logger';
import { collectLines } from './test-helpers';

describe('createLogger', () => {
  test('writes JSON lines without pid or hostname', () => {
    const { destination, lines } = collectLines();
    const logger = createLogger('debug', destination);
    logger.debug({ size: 3 }, 'heap ready');

    expect(lines).toHaveLength(1);
    const [line] = lines;
    expect(line).toMatchObject({ level: 20, size: 3, msg: 'heap ready' });
    expect(line).not.toHaveProperty('pid');
    expect(line).not.toHaveProperty('hostname');
    expect(typeof line?.time).toBe('string');
  });

  test('drops lines below the level', () => {
    const { destination, lines } = collectLines();
    const logger = createLogger('warn', destination);
    logger.info('ignored');
    logger.warn('kept');
    expect(lines.map(line => line.msg)).toEqual(['kept']);
  });
});
