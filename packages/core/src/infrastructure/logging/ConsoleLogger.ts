import type { LogContext, Logger } from '../../domain/ports/Logger.js';

export const LogLevel = {
  SILENT: 'silent',
  ERROR: 'error',
  WARN: 'warn',
  INFO: 'info',
  DEBUG: 'debug',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export type LogFormat = 'text' | 'json';

const SEVERITY: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface ConsoleLoggerOptions {
  /** Most verbose level written. Default: `'info'`. */
  readonly level?: LogLevel;
  /** Default: `'text'`. */
  readonly format?: LogFormat;
  readonly source?: string;
  /** Receives each formatted line. Default: `process.stderr`. */
  readonly write?: (line: string) => void;
  /** Default: `() => new Date()`. */
  readonly clock?: () => Date;
}

/**
 * Logger writing one line per entry, as text or JSON.
 *
 * Text: `2024-01-01T00:00:00.000Z INFO  [worker] Batch completed {"batchIndex":2}`
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly format: LogFormat;
  private readonly source: string | undefined;
  private readonly write: (line: string) => void;
  private readonly clock: () => Date;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'text';
    this.source = options.source;
    this.write = options.write ?? ((line) => process.stderr.write(`${line}\n`));
    this.clock = options.clock ?? (() => new Date());
  }

  child(source: string): Logger {
    return new ConsoleLogger({
      level: this.level,
      format: this.format,
      source: this.source ? `${this.source}:${source}` : source,
      write: this.write,
      clock: this.clock,
    });
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
    if (SEVERITY[level] > SEVERITY[this.level]) return;

    const timestamp = this.clock().toISOString();
    const serialized = context ? serializeContext(context) : undefined;

    if (this.format === 'json') {
      this.write(JSON.stringify({ timestamp, level, source: this.source, message, ...serialized }));
      return;
    }

    const parts = [timestamp, level.toUpperCase().padEnd(5)];
    if (this.source) parts.push(`[${this.source}]`);
    parts.push(message);
    if (serialized && Object.keys(serialized).length > 0) parts.push(JSON.stringify(serialized));
    this.write(parts.join(' '));
  }
}

function serializeContext(context: LogContext): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined) continue;
    result[key] = value instanceof Error ? serializeError(value) : value;
  }
  return result;
}

export function serializeError(error: Error): Record<string, unknown> {
  const serialized: Record<string, unknown> = { name: error.name, message: error.message };
  if ('code' in error && typeof error.code === 'string') {
    serialized['code'] = error.code;
  }
  return serialized;
}
