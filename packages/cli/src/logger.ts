import { ConnectorError } from '@tablediff/core';
import { ReconcileError } from '@tablediff/diff-core';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
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
  /** Line sink (default: stderr) */
  write?: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function toSerializable(value: unknown): unknown {
  if (value instanceof ReconcileError || value instanceof ConnectorError) {
    return value.toJSON();
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export class Logger {
  constructor(private readonly options: LoggerOptions = {}) {}

  private shouldLog(level: LogLevel): boolean {
    const configured = this.options.level ?? 'info';
    return LEVEL_ORDER[level] >= LEVEL_ORDER[configured];
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
    if (!this.shouldLog(level)) return;

    const fields: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(extra ?? {})) {
      fields[key] = toSerializable(value);
    }
    const record: LogRecord = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...fields,
    };

    const write = this.options.write ?? ((line: string) => process.stderr.write(line));

    if ((this.options.format ?? 'text') === 'json') {
      write(`${JSON.stringify(record)}\n`);
      return;
    }

    const suffix = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
    write(`${record.ts} ${record.level.toUpperCase()} :: ${record.msg}${suffix}\n`);
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
