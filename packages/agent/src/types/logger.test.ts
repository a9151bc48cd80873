import { describe, it, expect } from 'vitest';
import { ConsoleLogger, isLogLevel, silentLogger } from './logger.js';

describe('ConsoleLogger', () => {
  it('writes one JSON line per entry at or above its level', () => {
    const lines: Array<string> = [];
    const logger = new ConsoleLogger('warn', { component: 'test' }, (line) => lines.push(line));

    logger.debug('hidden');
    logger.info('hidden too');
    logger.warn('careful', { attempt: 2 });
    logger.error('broken');

    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({ level: 'warn', message: 'careful', component: 'test', attempt: 2 });
    expect(JSON.parse(lines[1] ?? '')).toMatchObject({ level: 'error', message: 'broken' });
  });

  it('merges context into child loggers', () => {
    const lines: Array<string> = [];
    const logger = new ConsoleLogger('debug', { sessionId: 's1' }, (line) => lines.push(line));

    logger.child({ tool: 'search_web' }).debug('tool finished');

    expect(JSON.parse(lines[0] ?? '')).toMatchObject({ sessionId: 's1', tool: 'search_web', message: 'tool finished' });
  });

  it('recognizes level names', () => {
    expect(isLogLevel('info')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(silentLogger.child({})).toBe(silentLogger);
  });
});
