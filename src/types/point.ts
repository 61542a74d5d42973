/**
 * Time-series point structures.
 * These map directly to one line of InfluxDB line protocol.
 */

export type FieldValue = string | number | boolean | bigint;

export interface Point {
  readonly measurement: string;
  readonly tags: Readonly<Record<string, string>>;
  readonly fields: Readonly<Record<string, FieldValue>>;
  readonly timestamp: bigint; // nanoseconds since epoch
}

/** Classifier output, before assembly into a Point. */
export interface ClassifiedRecord {
  measurement: string;
  tags: Record<string, string>;
  fields: Record<string, FieldValue>;
  timestamp: bigint;
}
