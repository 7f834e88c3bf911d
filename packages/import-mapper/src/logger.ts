import type { ILogger, LogLevel } from '@rowcast/core';

export type { LogLevel } from '@rowcast/core';
export type LogFormat = 'text' | 'json';

type LogRecord = {
  ts: string;
  level: LogLevel;
  msg: string;
  [key: string]: unknown;
};

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Line sink; defaults to stderr, since converted records go to stdout */
  write?: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/**
 * JSON-safe form of a log field: bigints as decimal strings, errors as
 * name, message and stack
 */
export function toLogValue(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') return value.toString();
  if (Array.isArray(value)) return value.map(toLogValue);
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, toLogValue(v)]));
  }
  return String(value);
}

function formatExtra(record: LogRecord): string {
  const { ts: _ts, level: _level, msg: _msg, ...extra } = record;
  const parts = Object.entries(extra).map(([k, v]) =>
    `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`
  );
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}

export class Logger implements ILogger {
  constructor(private readonly options: LoggerOptions = {}) {}

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.options.level ?? 'info'];
  }

  child(fields: Record<string, unknown>): Logger {
    const parent = this;
    return new (class extends Logger {
      override log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
        parent.log(level, msg, { ...fields, ...(extra ?? {}) });
      }
    })(this.options);
  }

  log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;

    const sanitized = toLogValue({
      ts: new Date().toISOString(),
      level,
      msg,
      ...(extra ?? {}),
    });
    if (!isPlainObject(sanitized)) return;
    const record: LogRecord = { ...sanitized, ts: String(sanitized.ts), level, msg: String(sanitized.msg) };

    const write = this.options.write ?? ((line: string) => process.stderr.write(line));

    if ((this.options.format ?? 'text') === 'json') {
      write(`${JSON.stringify(record)}\n`);
      return;
    }

    write(`[${record.ts}] ${record.level.toUpperCase()} ${record.msg}${formatExtra(record)}\n`);
  }

  debug(msg: string, extra?: Record<string, unknown>) {
    this.log('debug', msg, extra);
  }
  info(msg: string, extra?: Record<string, unknown>) {
    this.log('info', msg, extra);
  }
  warn(msg: string, extra?: Record<string, unknown>) {
    this.log('warn', msg, extra);
  }
  error(msg: string, extra?: Record<string, unknown>) {
    this.log('error', msg, extra);
  }
}
