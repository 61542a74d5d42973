/**
 * Log record shape accepted by the handlers.
 *
 * Host logging frameworks are adapted into this at the boundary
 * (see adapters/pino.ts); nothing downstream inspects framework objects.
 */

export type Severity = 'CRITICAL' | 'ERROR' | 'WARNING' | 'INFO' | 'DEBUG';

/** Debugging details some frameworks attach to every record. */
export interface RecordContext {
  pid?: number;
  hostname?: string;
  file?: string;
  line?: number;
  function?: string;
}

export interface LogRecord {
  /** Hierarchical logger name, e.g. "app.http.router". */
  readonly name: string;
  readonly level: Severity;
  readonly message: string;
  /** Attached exception, any shape. */
  readonly error?: unknown;
  /** Caller-supplied extras, in insertion order. */
  readonly attributes: ReadonlyMap<string, unknown>;
  /** Creation time, milliseconds since epoch. */
  readonly time: number;
  readonly context?: Readonly<RecordContext>;
}

export interface LogRecordInit {
  name?: string;
  level: Severity;
  message: string;
  error?: unknown;
  attributes?: ReadonlyMap<string, unknown> | Record<string, unknown>;
  time?: number;
  context?: RecordContext;
}

function isAttributeMap(
  value: LogRecordInit['attributes']
): value is ReadonlyMap<string, unknown> {
  return value instanceof Map;
}

/** Build a frozen LogRecord. `time` defaults to now. */
export function createLogRecord(init: LogRecordInit): LogRecord {
  const attributes = new Map<string, unknown>(
    isAttributeMap(init.attributes) ? init.attributes : Object.entries(init.attributes ?? {})
  );

  const record: LogRecord = {
    name: init.name ?? '',
    level: init.level,
    message: init.message,
    error: init.error,
    attributes,
    time: init.time ?? Date.now(),
    context: init.context ? Object.freeze({ ...init.context }) : undefined,
  };
  return Object.freeze(record);
}
