/**
 * Runtime context shared by the registry, dispatcher and manifest loader
 */

import type { Tracer } from '@opentelemetry/api';

/**
 * Logger interface for structured logging
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Logger that drops everything
 */
export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};

/**
 * Collaborators handed to the core components
 */
export interface SpindleContext {
  logger: Logger;
  tracer?: Tracer;
}
