/**
 * Record classification: decides, per attribute, tag vs field vs dropped.
 *
 * Compilation (once at handler construction):
 *  - string[] selections → identity rename maps
 *  - exclude lists → Sets
 *  - defaults applied, result frozen
 *
 * Application (per record, pure):
 *  1. measurement: override, or logger name with the hierarchy delimiter rewritten
 *  2. fixed keys: `level` tag, `short_message` / `full_message` / `host` / debugging fields
 *  3. tag pass over attributes: exclude → include map → extraTags
 *  4. field pass over attributes not emitted as tags: exclude → include map → extraFields
 *  5. any key already taken (by a tag or a field) is refused, so tag and
 *     field keys stay disjoint
 */

import type { ClassificationConfig, ClassificationOptions, KeySelection } from '../types/config.ts';
import type { ClassifiedRecord, FieldValue } from '../types/point.ts';
import type { LogRecord } from '../types/record.ts';
import { ClassificationError, MalformedPointError } from '../core/errors.ts';
import { levelTag } from './levels.ts';
import { rewriteHierarchy } from './hierarchy.ts';

export interface Classification extends ClassifiedRecord {
  /** Attributes that were skipped, one error each. */
  issues: ClassificationError[];
}

// ─── Compilation ────────────────────────────────────────────────────────────

function toKeyMap(selection: KeySelection | undefined): Map<string, string> {
  if (!selection) return new Map();
  if (isNameList(selection)) return new Map(selection.map((name) => [name, name]));
  return new Map(Object.entries(selection));
}

export function isNameList(selection: KeySelection): selection is readonly string[] {
  return Array.isArray(selection);
}

export function compileClassification(options: ClassificationOptions = {}): ClassificationConfig {
  return Object.freeze({
    measurement: options.measurement || undefined,
    includeTags: toKeyMap(options.includeTags),
    includeFields: toKeyMap(options.includeFields),
    excludeTags: new Set(options.excludeTags ?? []),
    excludeFields: new Set(options.excludeFields ?? []),
    extraTags: options.extraTags ?? false,
    extraFields: options.extraFields ?? true,
    includeStacktrace: options.includeStacktrace ?? true,
    debuggingFields: options.debuggingFields ?? true,
    levelNames: options.levelNames ?? false,
    localname: options.localname || undefined,
    hierarchyDelimiter: options.hierarchyDelimiter ?? '.',
    measurementDelimiter: options.measurementDelimiter ?? ':',
  });
}

// ─── Value rendering ────────────────────────────────────────────────────────

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
const MIN_SAFE = -MAX_SAFE;

type Rendered = { ok: true; value: FieldValue } | { ok: false; reason: string } | undefined;

function renderValue(value: unknown): Rendered {
  switch (typeof value) {
    case 'undefined':
      return undefined;
    case 'string':
    case 'boolean':
      return { ok: true, value };
    case 'bigint':
      // the store client writes integers through a JS number
      return value >= MIN_SAFE && value <= MAX_SAFE
        ? { ok: true, value }
        : { ok: false, reason: `integer ${value} outside the safe range` };
    case 'number':
      return Number.isFinite(value)
        ? { ok: true, value }
        : { ok: false, reason: `non-finite number ${value}` };
    case 'function':
    case 'symbol':
      return { ok: false, reason: `unsupported type ${typeof value}` };
  }
  if (value === null) return undefined;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime())
      ? { ok: false, reason: 'invalid date' }
      : { ok: true, value: value.toISOString() };
  }
  try {
    const json = JSON.stringify(value);
    if (json === undefined) return { ok: false, reason: 'value is not serialisable' };
    return { ok: true, value: json };
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, reason: `value is not serialisable (${msg})` };
  }
}

/** Stack trace as a JSON array of lines, so the field never carries a raw newline. */
function renderStacktrace(error: unknown): string | undefined {
  if (error instanceof Error) {
    const stack = typeof error.stack === 'string' && error.stack !== ''
      ? error.stack
      : `${error.name}: ${error.message}`;
    return JSON.stringify(stack.split('\n'));
  }
  if (typeof error === 'string') return JSON.stringify(error.split('\n'));
  if (typeof error === 'object' && error !== null && 'stack' in error && typeof error.stack === 'string') {
    return JSON.stringify(error.stack.split('\n'));
  }
  const json = JSON.stringify(error);
  return json === undefined ? undefined : JSON.stringify([json]);
}

/** Milliseconds (possibly fractional) → integer nanoseconds. */
export function toNanoseconds(ms: number): bigint {
  const whole = Math.trunc(ms);
  const frac = ms - whole;
  return BigInt(whole) * 1_000_000n + BigInt(Math.round(frac * 1_000_000));
}

// ─── Application ────────────────────────────────────────────────────────────

export function measurementFor(record: LogRecord, config: ClassificationConfig): string {
  return (
    config.measurement ??
    rewriteHierarchy(record.name, config.hierarchyDelimiter, config.measurementDelimiter)
  );
}

export function classify(record: LogRecord, config: ClassificationConfig): Classification {
  const measurement = measurementFor(record, config);
  if (!Number.isFinite(record.time)) {
    throw new MalformedPointError(measurement, `invalid creation time ${record.time}`);
  }

  const tags: Record<string, string> = { level: levelTag(record.level, config.levelNames) };
  const fields: Record<string, FieldValue> = { short_message: record.message };
  const issues: ClassificationError[] = [];

  if (record.error !== undefined && record.error !== null && config.includeStacktrace) {
    try {
      const full = renderStacktrace(record.error);
      if (full !== undefined) fields.full_message = full;
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      issues.push(new ClassificationError('full_message', `stack trace not renderable (${msg})`));
    }
  }

  if (config.localname !== undefined) fields.host = config.localname;

  if (config.debuggingFields && record.context) {
    const { pid, hostname, file, line } = record.context;
    if (pid !== undefined) fields.pid = pid;
    if (hostname !== undefined) fields.hostname = hostname;
    if (file !== undefined) fields.file = file;
    if (line !== undefined) fields.line = line;
    if (record.context.function !== undefined) fields.function = record.context.function;
  }

  const isTaken = (key: string): boolean =>
    key === 'time' || Object.hasOwn(tags, key) || Object.hasOwn(fields, key);

  const tagged = new Set<string>();

  // Tag pass
  for (const [name, value] of record.attributes) {
    if (config.excludeTags.has(name)) continue;
    const key = config.includeTags.get(name) ?? (config.extraTags ? name : undefined);
    if (key === undefined) continue;

    const rendered = renderValue(value);
    if (rendered === undefined) continue;
    if (!rendered.ok) {
      issues.push(new ClassificationError(name, rendered.reason));
      continue;
    }
    if (isTaken(key)) {
      issues.push(new ClassificationError(name, `tag key "${key}" already in use`));
      continue;
    }
    tags[key] = String(rendered.value);
    tagged.add(name);
  }

  // Field pass
  for (const [name, value] of record.attributes) {
    if (tagged.has(name) || config.excludeFields.has(name)) continue;
    const key = config.includeFields.get(name) ?? (config.extraFields ? name : undefined);
    if (key === undefined) continue;

    const rendered = renderValue(value);
    if (rendered === undefined) continue;
    if (!rendered.ok) {
      issues.push(new ClassificationError(name, rendered.reason));
      continue;
    }
    if (isTaken(key)) {
      issues.push(new ClassificationError(name, `field key "${key}" already in use`));
      continue;
    }
    fields[key] = rendered.value;
  }

  return { measurement, tags, fields, timestamp: toNanoseconds(record.time), issues };
}
