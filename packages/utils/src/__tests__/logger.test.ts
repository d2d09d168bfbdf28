import { describe, expect, it } from 'vitest';

import { createLogger, isLogLevel, type LoggerOptions } from '../logger.js';

function capture(options: LoggerOptions = {}) {
  const lines: Record<string, unknown>[] = [];
  const logger = createLogger({
    ...options,
    destination: {
      write(message: string) {
        lines.push(JSON.parse(message));
      }
    }
  });
  return { logger, lines };
}

describe('createLogger', () => {
  it('writes JSON lines with an ISO timestamp and the service name', () => {
    const { logger, lines } = capture();

    logger.info({ id: 3 }, 'Image 3 deleted');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 30, name: 'pixhold', id: 3, msg: 'Image 3 deleted' });
    expect(lines[0]?.['time']).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it('filters below the configured level', () => {
    const { logger, lines } = capture({ level: 'warn' });

    logger.info('hidden');
    logger.warn('shown');

    expect(lines.map((line) => line['msg'])).toEqual(['shown']);
  });

  it('carries child bindings', () => {
    const { logger, lines } = capture({ name: 'test' });

    logger.child({ component: 'db' }).debug('not at info');
    logger.child({ component: 'db' }).info('Applying migration 1');

    expect(lines).toEqual([
      expect.objectContaining({ name: 'test', component: 'db', msg: 'Applying migration 1' })
    ]);
  });
});

describe('isLogLevel', () => {
  it('accepts pino levels and silent', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('INFO')).toBe(false);
  });
});
