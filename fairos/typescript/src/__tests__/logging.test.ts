/**
 * Tests for logging.
 */

import { describe, expect, it } from 'vitest';
import { ConsoleLogger, LogLevel, NoopLogger, createLogger } from '../observability';

function capture(): { lines: Array<[LogLevel, string]>; sink: (level: LogLevel, line: string) => void } {
  const lines: Array<[LogLevel, string]> = [];
  return { lines, sink: (level, line) => lines.push([level, line]) };
}

describe('ConsoleLogger', () => {
  it('formats text lines', () => {
    const { lines, sink } = capture();
    const logger = new ConsoleLogger({ timestamps: false, sink });

    logger.info('hello');
    logger.warn('careful', { pod: 'photos' });

    expect(lines).toEqual([
      [LogLevel.Info, '[INFO] hello'],
      [LogLevel.Warn, '[WARN] careful {"pod":"photos"}'],
    ]);
  });

  it('appends the error to text lines', () => {
    const { lines, sink } = capture();
    new ConsoleLogger({ timestamps: false, sink }).error('failed', new Error('boom'));

    expect(lines).toEqual([[LogLevel.Error, '[ERROR] failed Error: boom']]);
  });

  it('drops entries below the configured level', () => {
    const { lines, sink } = capture();
    const logger = new ConsoleLogger({ level: LogLevel.Warn, timestamps: false, sink });

    logger.debug('one');
    logger.info('two');
    logger.warn('three');

    expect(lines).toEqual([[LogLevel.Warn, '[WARN] three']]);
  });

  it('redacts secrets', () => {
    const { lines, sink } = capture();
    new ConsoleLogger({ timestamps: false, sink }).info('login', {
      username: 'alice',
      password: 'test-secret',
      token: 'test-token',
    });

    expect(lines).toEqual([
      [
        LogLevel.Info,
        '[INFO] login {"username":"alice","password":"[REDACTED]","token":"[REDACTED]"}',
      ],
    ]);
  });

  it('writes JSON lines with child context', () => {
    const { lines, sink } = capture();
    const logger = new ConsoleLogger({ json: true, sink }).child({ service: 'kv' });

    logger.warn('Seek ended', { store: 'prefs' });

    const [entry] = lines;
    expect(entry?.[0]).toBe(LogLevel.Warn);
    const parsed: unknown = JSON.parse(entry?.[1] ?? '');
    expect(parsed).toMatchObject({
      level: 'warn',
      message: 'Seek ended',
      service: 'kv',
      store: 'prefs',
    });
  });

  it('creates loggers from partial config', () => {
    const { lines, sink } = capture();
    createLogger({ level: LogLevel.Debug, timestamps: false, sink }).debug('ready');

    expect(lines).toEqual([[LogLevel.Debug, '[DEBUG] ready']]);
  });
});

describe('NoopLogger', () => {
  it('returns itself as child', () => {
    const logger = new NoopLogger();
    expect(logger.child({ service: 'user' })).toBe(logger);
  });
});
