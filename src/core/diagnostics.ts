/**
 * Diagnostic channel for the handlers themselves.
 *
 * Failures inside a log handler cannot be logged through that same handler,
 * so they go to a separate pino logger on stderr (fd 2).
 */

import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

/** Receives every error a handler swallows. Must not throw. */
export type ErrorReporter = (error: Error) => void;

export function makeDiagnosticLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === 'true';
  const level = process.env.LOGPOINT_LOG_LEVEL ?? 'warn';

  return pino(
    {
      name: 'logpoint',
      level,
      enabled: !isVitest,
      base: { ...bindings },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/** For tests - preserves the Logger type, emits nothing. */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

export function loggingReporter(logger: Logger): ErrorReporter {
  return (error) => {
    logger.error({ err: error }, error.message);
  };
}

/** Wraps a user reporter so that a throwing reporter cannot escape emit(). */
export function guardReporter(reporter: ErrorReporter, fallback: Logger): ErrorReporter {
  return (error) => {
    try {
      reporter(error);
    } catch (reporterError) {
      fallback.error({ err: reporterError, original: error }, 'error reporter threw');
    }
  };
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
