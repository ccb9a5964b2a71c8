import pino from 'pino';
import type { ILogger, LogData, LogLevel } from '../../domain/ports/ILogger.js';

export interface PinoLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
}

/**
 * Pino-based logger implementation
 */
export class PinoLogger implements ILogger {
  private readonly logger: pino.Logger;

  constructor(options: PinoLoggerOptions | pino.Logger = {}) {
    if ('child' in options) {
      this.logger = options;
      return;
    }

    const transport = options.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined;

    this.logger = pino({
      name: options.name ?? 'steady-link',
      level: options.level ?? 'info',
      ...(transport && { transport }),
    });
  }

  trace(message: string, data?: LogData): void {
    this.write('trace', message, data);
  }

  debug(message: string, data?: LogData): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: LogData): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: LogData): void {
    this.write('warn', message, data);
  }

  error(message: string, error?: unknown, data?: LogData): void {
    this.write('error', message, errorBindings(error, data));
  }

  fatal(message: string, error?: unknown, data?: LogData): void {
    this.write('fatal', message, errorBindings(error, data));
  }

  child(bindings: LogData): ILogger {
    return new PinoLogger(this.logger.child(bindings));
  }

  private write(level: LogLevel, message: string, data?: LogData): void {
    if (data) {
      this.logger[level](data, message);
    } else {
      this.logger[level](message);
    }
  }
}

function errorBindings(error: unknown, data?: LogData): LogData {
  return error instanceof Error ? { err: error, ...data } : { error, ...data };
}
