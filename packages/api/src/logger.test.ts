import { describe, it, expect } from 'vitest';
import { createLogger, responseLogLevel } from './logger.js';

describe('responseLogLevel', () => {
  it.each([
    [200, 'info'],
    [304, 'info'],
    [400, 'warn'],
    [404, 'warn'],
    [500, 'error'],
    [503, 'error'],
  ])('logs status %i at %s', (status, level) => {
    expect(responseLogLevel(status)).toBe(level);
  });

  it('logs at error when the response carries an error', () => {
    expect(responseLogLevel(200, new Error('socket hang up'))).toBe('error');
  });
});

describe('createLogger', () => {
  it('writes named JSON lines at or above the configured level', () => {
    const lines: string[] = [];
    const logger = createLogger('warn', {
      write: (line: string) => {
        lines.push(line);
      },
    });

    logger.info('dropped');
    logger.warn({ port: 7860 }, 'kept');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({ level: 40, name: 'mailsift', port: 7860, msg: 'kept' });
  });
});
