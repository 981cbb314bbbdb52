/** Structured data attached to a log line. `Error` values are serialised. */
export type LogContext = Readonly<Record<string, unknown>>;

/** Port for structured logging. */
export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  /** Logger whose lines carry `source`, appended to this logger's own. */
  child(source: string): Logger;
}
