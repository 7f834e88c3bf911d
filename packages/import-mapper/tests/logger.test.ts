import { describe, expect, it } from 'vitest';
import { Logger, toLogValue } from '../src/logger.js';

function capture() {
  const lines: string[] = [];
  return { lines, write: (line: string) => lines.push(line) };
}

describe('Logger', () => {
  it('writes one JSON record per line', () => {
    const sink = capture();
    const logger = new Logger({ format: 'json', write: sink.write });

    logger.info('hello', { field: 'name', count: 1 });

    expect(sink.lines).toHaveLength(1);
    expect(JSON.parse(sink.lines[0] ?? '')).toMatchObject({
      level: 'info',
      msg: 'hello',
      field: 'name',
      count: 1,
    });
  });

  it('logs field values unchanged', () => {
    const sink = capture();
    const logger = new Logger({ format: 'json', level: 'debug', write: sink.write });

    logger.debug('Converting field', { value: 'postgres://app:pw@db/app', password: 'x' });

    expect(JSON.parse(sink.lines[0] ?? '')).toMatchObject({
      value: 'postgres://app:pw@db/app',
      password: 'x',
    });
  });

  it('drops records below the configured level', () => {
    const sink = capture();
    const logger = new Logger({ write: sink.write });

    logger.debug('hidden');
    expect(sink.lines).toHaveLength(0);
    expect(logger.isLevelEnabled('warn')).toBe(true);
  });

  it('adds bound fields in child loggers', () => {
    const sink = capture();
    const logger = new Logger({ format: 'json', level: 'debug', write: sink.write });

    logger.child({ table: 'customers' }).debug('Converting field', { field: 'id' });

    expect(JSON.parse(sink.lines[0] ?? '')).toMatchObject({
      level: 'debug',
      msg: 'Converting field',
      table: 'customers',
      field: 'id',
    });
  });

  it('appends extra fields in text format', () => {
    const sink = capture();
    const logger = new Logger({ write: sink.write });

    logger.warn('careful', { field: 'id', count: 2 });

    expect(sink.lines[0]).toMatch(/^\[[^\]]+\] WARN careful field=id count=2\n$/);
  });

  it('renders bigints and errors as JSON-safe values', () => {
    const error = new Error('disk full');

    expect(toLogValue({ id: 5n, ids: [1n, 2], error })).toEqual({
      id: '5',
      ids: ['1', 2],
      error: { name: 'Error', message: 'disk full', stack: error.stack },
    });
  });
});
