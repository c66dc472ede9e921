import { describe, it, expect } from 'vitest';
import { createLogger, createMemoryLogger, type LogEntry } from '../../src/utils/Logger.js';

describe('Logger', () => {
  it('should drop entries below the configured level', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger('warn', 'Test', (entry) => entries.push(entry));

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');

    expect(entries.map((entry) => entry.level)).toEqual(['warn', 'error']);
  });

  it('should log nothing when silent', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger('silent', undefined, (entry) => entries.push(entry));

    logger.error('nope');

    expect(entries).toHaveLength(0);
  });

  it('should join child contexts with a colon', () => {
    const { logger, entries } = createMemoryLogger();

    logger.child('Renderer').child('Images').info('fetched', { slideIndex: 2 });

    expect(entries).toHaveLength(1);
    expect(entries[0]?.context).toBe('Renderer:Images');
    expect(entries[0]?.data).toEqual({ slideIndex: 2 });
  });

  it('should keep the parent level in children', () => {
    const { logger, entries } = createMemoryLogger('error');

    logger.child('Binder').warn('ignored');

    expect(entries).toHaveLength(0);
  });
});
