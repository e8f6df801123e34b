/**
 * Structured logger
 *
 * Thin wrapper over the Cloud Functions logger so every module logs the same
 * way: a short message plus a flat context object. Entries are written as
 * JSON lines on stdout, which Cloud Logging picks up as structured payloads
 * and which stay readable when the pipeline runs as a plain Node process.
 */

import * as logger from 'firebase-functions/logger';

export type LogContext = Record<string, unknown>;

function write(
  emit: (...args: unknown[]) => void,
  message: string,
  context?: LogContext
): void {
  if (context) {
    emit(message, context);
  } else {
    emit(message);
  }
}

export const log = {
  debug(message: string, context?: LogContext): void {
    write(logger.debug, message, context);
  },
  info(message: string, context?: LogContext): void {
    write(logger.info, message, context);
  },
  warn(message: string, context?: LogContext): void {
    write(logger.warn, message, context);
  },
  error(message: string, context?: LogContext): void {
    write(logger.error, message, context);
  }
};

/**
 * Render an unknown thrown value for a log context.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
