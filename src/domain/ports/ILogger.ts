export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

/** Structured fields attached to a log line */
export type LogData = Record<string, unknown>;

export type LogMethod = (message: string, data?: LogData) => void;

/** Error instances end up under `err`, anything else under `error` */
export type ErrorLogMethod = (message: string, error?: unknown, data?: LogData) => void;

/**
 * Logging port. The controller and adapters only see this, never pino.
 */
export interface ILogger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: ErrorLogMethod;
  fatal: ErrorLogMethod;
  child(bindings: LogData): ILogger;
}
