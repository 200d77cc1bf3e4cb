import { createLogger as createWinstonLogger, format, type Logger, transports } from 'winston';

/** Log levels the client accepts, winston's npm levels. */
export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'silly';

/**
 * JSON console logger with timestamps and error stacks.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  return createWinstonLogger({
    level,
    format: format.combine(format.timestamp(), format.errors({ stack: true }), format.json()),
    transports: [new transports.Console()],
  });
}

/**
 * Logger used when a client is given none; it writes nothing.
 */
export function createSilentLogger(): Logger {
  return createWinstonLogger({ silent: true, transports: [new transports.Console({ silent: true })] });
}
