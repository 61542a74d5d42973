/**
 * Stateless pipeline: process(record) → Point[]
 *
 * Steps:
 *  1. Classify attributes into tags and fields
 *  2. Report skipped attributes
 *  3. Assemble the point
 *  4. Backpop: one extra point per ancestor of the measurement
 *
 * Never throws; a record that cannot become a point is reported and dropped.
 */

import type { ClassificationConfig } from '../types/config.ts';
import type { Point } from '../types/point.ts';
import type { LogRecord } from '../types/record.ts';
import type { ErrorReporter } from './diagnostics.ts';
import { toError } from './diagnostics.ts';
import { classify } from '../transform/classify.ts';
import { pointFromClassified, withMeasurement } from '../transform/buildPoint.ts';
import { ancestors } from '../transform/hierarchy.ts';

/** All points for one record: the point itself, then its ancestors when backpop applies. */
export function expandBackpop(point: Point, config: ClassificationConfig, backpop: boolean): Point[] {
  // A fixed measurement has no hierarchy to walk.
  if (!backpop || config.measurement !== undefined) return [point];
  return ancestors(point.measurement, config.measurementDelimiter).map((name) =>
    withMeasurement(point, name)
  );
}

export class Pipeline {
  constructor(
    readonly classification: ClassificationConfig,
    private readonly backpop: boolean,
    private readonly report: ErrorReporter
  ) {}

  process(record: LogRecord): Point[] {
    try {
      const classified = classify(record, this.classification);
      for (const issue of classified.issues) this.report(issue);
      const point = pointFromClassified(classified);
      return expandBackpop(point, this.classification, this.backpop);
    } catch (err) {
      this.report(toError(err));
      return [];
    }
  }
}
