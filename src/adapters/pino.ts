/**
 * pino adapter: pino log objects / JSON lines → LogRecord.
 *
 * Usage:
 *   const handler = new LogPoint().influx(url, { database: 'logs' }).build();
 *   const logger = pino({ name: 'app.http' }, pinoDestination(handler));
 *   logger.child({ tenant: 'acme' }).info({ route: '/health' }, 'ok');
 */

import type { ErrorReporter } from '../core/diagnostics.ts';
import type { LogHandler } from '../core/BaseHandler.ts';
import type { LogRecord, RecordContext, Severity } from '../types/record.ts';
import { loggingReporter, makeDiagnosticLogger, toError } from '../core/diagnostics.ts';
import { createLogRecord } from '../types/record.ts';

export interface PinoAdapterOptions {
  /** pino's `messageKey`. Default "msg". */
  messageKey?: string;
  /** pino's `errorKey`. Default "err". */
  errorKey?: string;
}

export interface PinoDestinationOptions extends PinoAdapterOptions {
  onError?: ErrorReporter;
}

/** Minimal writable pino accepts as a destination. */
export interface LineDestination {
  write(line: string): void;
}

const PINO_LABELS: Readonly<Record<string, Severity>> = {
  fatal: 'CRITICAL',
  error: 'ERROR',
  warn: 'WARNING',
  info: 'INFO',
  debug: 'DEBUG',
  trace: 'DEBUG',
};

/** pino numeric levels (10…60) or labels → Severity. trace folds into DEBUG. */
export function pinoLevel(level: unknown): Severity {
  if (typeof level === 'number') {
    if (level >= 60) return 'CRITICAL';
    if (level >= 50) return 'ERROR';
    if (level >= 40) return 'WARNING';
    if (level >= 30) return 'INFO';
    return 'DEBUG';
  }
  if (typeof level === 'string') return PINO_LABELS[level.toLowerCase()] ?? 'INFO';
  return 'INFO';
}

function pinoTime(time: unknown): number {
  if (typeof time === 'number' && Number.isFinite(time)) return time;
  if (typeof time === 'string') {
    const parsed = Date.parse(time);
    if (!Number.isNaN(parsed)) return parsed;
  }
  return Date.now();
}

function pinoContext(obj: Record<string, unknown>): RecordContext | undefined {
  const context: RecordContext = {};
  if (typeof obj.pid === 'number') context.pid = obj.pid;
  if (typeof obj.hostname === 'string') context.hostname = obj.hostname;
  return Object.keys(context).length > 0 ? context : undefined;
}

export function fromPinoLog(
  obj: Record<string, unknown>,
  options: PinoAdapterOptions = {}
): LogRecord {
  const messageKey = options.messageKey ?? 'msg';
  const errorKey = options.errorKey ?? 'err';
  const core = new Set(['level', 'time', 'name', 'pid', 'hostname', messageKey, errorKey]);

  const attributes = new Map<string, unknown>();
  for (const [key, value] of Object.entries(obj)) {
    if (!core.has(key)) attributes.set(key, value);
  }

  const message = obj[messageKey];
  return createLogRecord({
    name: typeof obj.name === 'string' ? obj.name : '',
    level: pinoLevel(obj.level),
    message: message === undefined ? '' : String(message),
    error: obj[errorKey],
    attributes,
    time: pinoTime(obj.time),
    context: pinoContext(obj),
  });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * A pino destination that feeds every line into `handler`.
 * Lines that are not JSON objects go to the error channel.
 */
export function pinoDestination(
  handler: LogHandler,
  options: PinoDestinationOptions = {}
): LineDestination {
  const report = options.onError ?? loggingReporter(makeDiagnosticLogger());

  return {
    write(chunk: string): void {
      for (const line of chunk.split('\n')) {
        if (line.trim() === '') continue;
        let parsed: unknown;
        try {
          parsed = JSON.parse(line);
        } catch (err) {
          report(new Error(`Unparseable log line: ${toError(err).message}`));
          continue;
        }
        if (!isPlainObject(parsed)) {
          report(new Error('Log line is not a JSON object'));
          continue;
        }
        // Handlers never reject and track their own pending writes.
        void handler.emit(fromPinoLog(parsed, options));
      }
    },
  };
}
