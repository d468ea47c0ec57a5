import pino from 'pino';
import type { Logger } from 'pino';

export interface LoggerOptions {
  level: string;
  /** Pretty-print with pino-pretty when 'development' */
  nodeEnv: string;
}

/**
 * Root logger for a relay process. Structured JSON outside development.
 * Logs go to stderr so command output on stdout stays clean.
 */
export function createLogger(options: LoggerOptions): Logger {
  if (options.nodeEnv === 'development') {
    return pino({
      level: options.level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }
  return pino({ level: options.level }, pino.destination(2));
}
