import type { PointWriter } from '../core/InfluxWriter.ts';
import type { HandlerDeps } from '../core/BaseHandler.ts';
import type { ClassificationOptions } from '../types/config.ts';
import type { Point } from '../types/point.ts';
import type { LogRecord, LogRecordInit } from '../types/record.ts';
import { DeliveryError } from '../core/errors.ts';
import { makeNoopLogger } from '../core/diagnostics.ts';
import { Pipeline } from '../core/Pipeline.ts';
import { compileClassification } from '../transform/classify.ts';
import { createLogRecord } from '../types/record.ts';

export const T0 = 1_700_000_000_000;

/** In-process stand-in for the store. */
export class MemoryWriter implements PointWriter {
  readonly batches: Point[][] = [];
  connects = 0;
  writes = 0;
  failConnect = false;
  failWrites = 0;
  /** When set, write() waits for it before storing the batch. */
  gate: Promise<void> | undefined;

  async connect(): Promise<void> {
    this.connects++;
    if (this.failConnect) throw new DeliveryError('Store ping failed: HTTP 503', { status: 503, pointCount: 0 });
  }

  async write(points: readonly Point[]): Promise<void> {
    this.writes++;
    if (this.failWrites > 0) {
      this.failWrites--;
      throw new DeliveryError('Store write failed: HTTP 500', { status: 500, pointCount: points.length });
    }
    if (this.gate) await this.gate;
    this.batches.push([...points]);
  }

  get points(): Point[] {
    return this.batches.flat();
  }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function makeRecord(overrides: Partial<LogRecordInit> = {}): LogRecord {
  return createLogRecord({
    name: 'a.b.c',
    level: 'INFO',
    message: 'hello',
    time: T0,
    ...overrides,
  });
}

export function makeDeps(
  writer: PointWriter,
  options: { classification?: ClassificationOptions; backpop?: boolean; lazyInit?: boolean } = {}
): { deps: HandlerDeps; errors: Error[] } {
  const errors: Error[] = [];
  const report = (error: Error): void => {
    errors.push(error);
  };
  const deps: HandlerDeps = {
    pipeline: new Pipeline(compileClassification(options.classification), options.backpop ?? true, report),
    writer,
    report,
    logger: makeNoopLogger(),
    lazyInit: options.lazyInit ?? false,
  };
  return { deps, errors };
}

/** Let queued promise callbacks run. */
export async function settle(): Promise<void> {
  for (let i = 0; i < 20; i++) await Promise.resolve();
}
