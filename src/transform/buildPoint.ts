import type { ClassifiedRecord, FieldValue, Point } from '../types/point.ts';
import { MalformedPointError } from '../core/errors.ts';

export function buildPoint(
  measurement: string,
  tags: Readonly<Record<string, string>>,
  fields: Readonly<Record<string, FieldValue>>,
  timestamp: bigint
): Point {
  if (!Object.hasOwn(tags, 'level')) {
    throw new MalformedPointError(measurement, 'missing "level" tag');
  }
  if (!Object.hasOwn(fields, 'short_message')) {
    throw new MalformedPointError(measurement, 'missing "short_message" field');
  }
  for (const key of Object.keys(tags)) {
    if (Object.hasOwn(fields, key)) {
      throw new MalformedPointError(measurement, `key "${key}" is both a tag and a field`);
    }
  }

  return Object.freeze({
    measurement,
    tags: Object.freeze({ ...tags }),
    fields: Object.freeze({ ...fields }),
    timestamp,
  });
}

export function pointFromClassified(c: ClassifiedRecord): Point {
  return buildPoint(c.measurement, c.tags, c.fields, c.timestamp);
}

/** Same tags, fields and timestamp under another measurement. */
export function withMeasurement(point: Point, measurement: string): Point {
  if (point.measurement === measurement) return point;
  return Object.freeze({ ...point, measurement });
}
