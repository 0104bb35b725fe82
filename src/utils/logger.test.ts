import { describe, it, expect, afterEach, jest } from '@jest/globals';
import { Logger, LogLevel, maskToken, parseLogLevel } from './logger.js';

describe('parseLogLevel', () => {
  it('accepts the common spellings', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(' WARNING ')).toBe(LogLevel.WARN);
    expect(parseLogLevel('CRITICAL')).toBe(LogLevel.ERROR);
    expect(parseLogLevel('none')).toBe(LogLevel.SILENT);
  });

  it('falls back for unknown or missing values', () => {
    expect(parseLogLevel(undefined)).toBe(LogLevel.WARN);
    expect(parseLogLevel('loud', LogLevel.INFO)).toBe(LogLevel.INFO);
  });
});

describe('Logger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('writes messages at or above its level to stderr', () => {
    const write = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = new Logger({ level: LogLevel.WARN, useColors: false });

    logger.info('hidden');
    logger.warn('careful');
    logger.error('broken');

    expect(write.mock.calls.map(([chunk]) => chunk)).toEqual(['careful\n', 'broken\n']);
  });

  it('can be raised to debug', () => {
    const write = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = new Logger({ useColors: false });

    logger.setLevel(LogLevel.DEBUG);
    logger.debug('details');

    expect(write).toHaveBeenCalledWith('details\n');
  });
});

describe('maskToken', () => {
  it('keeps only the first characters', () => {
    expect(maskToken('eyJ0eXAiOiJKV1QiLCJhbGciOi')).toBe('eyJ0eXAiOi...');
  });

  it('hides short values entirely', () => {
    expect(maskToken('abc')).toBe('***');
  });
});
