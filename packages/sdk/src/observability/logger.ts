/**
 * pino-backed Logger
 */

import pino, { type Logger as PinoLogger } from 'pino';
import { z } from 'zod';
import type { Logger } from '../types/context';

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  /** Destination stream, stdout when omitted */
  destination?: pino.DestinationStream;
}

// Provider configs often carry credentials
const REDACT_PATHS = [
  'config.token',
  'config.secret',
  'config.password',
  'config.apiKey',
  'config.credential'
];

/**
 * Wrap an existing pino instance
 */
export function fromPino(instance: PinoLogger): Logger {
  return {
    debug: (message, meta) => instance.debug(meta ?? {}, message),
    info: (message, meta) => instance.info(meta ?? {}, message),
    warn: (message, meta) => instance.warn(meta ?? {}, message),
    error: (message, meta) => instance.error(meta ?? {}, message)
  };
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions: pino.LoggerOptions = {
    name: options.name ?? 'spindle',
    level: options.level ?? 'info',
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]'
    }
  };

  const instance = options.destination
    ? pino(pinoOptions, options.destination)
    : pino(pinoOptions);

  return fromPino(instance);
}
