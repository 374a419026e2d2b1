import { describe, it, expect } from 'vitest';
import { Logger, createLogger } from '../../src/utils/Logger.js';
import type { LogEntry } from '../../src/utils/Logger.js';

function capture(): { entries: LogEntry[]; sink: (entry: LogEntry) => void } {
  const entries: LogEntry[] = [];
  return { entries, sink: (entry) => entries.push(entry) };
}

describe('Logger', () => {
  it('should drop entries below its level', () => {
    const { entries, sink } = capture();
    const logger = createLogger('warn', undefined, sink);

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown', { key: 1 });
    logger.error('shown too');

    expect(entries.map((e) => [e.level, e.message])).toEqual([
      ['warn', 'shown'],
      ['error', 'shown too'],
    ]);
    expect(entries[0]?.data).toEqual({ key: 1 });
    expect(entries[0]?.context).toBeUndefined();
  });

  it('should join child contexts', () => {
    const { entries, sink } = capture();
    const logger = new Logger('debug', 'Deck', sink).child('Parser').child('Lexer');

    logger.debug('token');

    expect(entries[0]?.context).toBe('Deck:Parser:Lexer');
  });

  it('should write nothing when silent', () => {
    const { entries, sink } = capture();
    const logger = createLogger('silent', 'Deck', sink);

    logger.error('nothing');

    expect(entries).toEqual([]);
    expect(logger.isEnabled('error')).toBe(false);
  });

  it('should report which levels are enabled', () => {
    const logger = createLogger('info');

    expect(logger.isEnabled('debug')).toBe(false);
    expect(logger.isEnabled('info')).toBe(true);
    expect(logger.isEnabled('error')).toBe(true);
    expect(logger.isEnabled('silent')).toBe(false);
  });
});
