/**
 * Immediate writer: every emitted record is written to the store at once,
 * as one batch holding the record's point and its backpop ancestors.
 *
 * emit() resolves when the write settled and never rejects.
 */

import type { LogRecord } from '../types/record.ts';
import type { HandlerDeps } from './BaseHandler.ts';
import { BaseHandler } from './BaseHandler.ts';

export class InfluxHandler extends BaseHandler {
  constructor(deps: HandlerDeps) {
    super(deps);
  }

  emit(record: LogRecord): Promise<void> {
    if (this.closed) return Promise.resolve();
    const points = this.pipeline.process(record);
    if (points.length === 0) return Promise.resolve();
    return this.track(this.deliver(points)).then(() => undefined);
  }

  /** Stops accepting records and waits for writes already started. */
  async close(): Promise<void> {
    this.closed = true;
    await this.settle();
  }
}
