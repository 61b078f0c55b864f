/**
 * Structured Logger with Pino
 */
import pino, { Logger as PinoLogger } from 'pino';
import type { FormatKind } from '@tariffline/shared';

export interface LogContext {
  requestId?: string;
  component?: string;
  /** Input file the entries are about */
  filename?: string;
  format?: FormatKind;
  /** `<pdf> + <txt>` of the pair being combined */
  pair?: string;
}

const isDev = process.env.NODE_ENV === 'development';

export const logger: PinoLogger = pino({
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
  transport: isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  base: {
    service: 'tariffline',
    env: process.env.NODE_ENV || 'development',
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function createChildLogger(context: LogContext, parent: PinoLogger = logger): PinoLogger {
  return parent.child(context);
}

export type { PinoLogger as Logger };
