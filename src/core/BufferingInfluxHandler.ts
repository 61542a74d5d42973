/**
 * Buffering writer: points accumulate in memory and are written as one batch
 * when the buffer reaches `capacity` or when the flush timer fires,
 * whichever comes first.
 *
 * idle ──emit──▶ accumulating ──flush──▶ flushing ──▶ accumulating …
 *   └──────────────── close() ──────────────▶ closed
 *
 * Append and swap are synchronous, so on the single event loop no point can
 * be lost, duplicated or land in two batches. The network write happens after
 * the swap; emits during a write go to the fresh buffer.
 *
 * A capacity-triggered flush is fire-and-forget: emit() returns immediately
 * and never waits on the store.
 */

import type { Point } from '../types/point.ts';
import type { LogRecord } from '../types/record.ts';
import type { HandlerDeps } from './BaseHandler.ts';
import { BaseHandler } from './BaseHandler.ts';

/** Longest interval a Node timer can hold (2^31 - 1 ms), in whole seconds. */
export const MAX_FLUSH_INTERVAL = 2_147_483;

export type BufferState = 'idle' | 'accumulating' | 'flushing' | 'closed';

export interface BufferingOptions {
  /** Points held before a flush is forced. */
  capacity: number;
  /** Seconds between timer-driven flushes. */
  flushInterval: number;
}

export interface BufferStats {
  state: BufferState;
  buffered: number;
  flushes: number;
  droppedPoints: number;
}

export class BufferingInfluxHandler extends BaseHandler {
  readonly capacity: number;
  readonly flushInterval: number;

  private buffer: Point[] = [];
  private timer: NodeJS.Timeout | undefined;
  private cancelled = false;
  private writing = 0;
  private _state: BufferState = 'idle';
  private flushes = 0;
  private droppedPoints = 0;

  constructor(deps: HandlerDeps, options: BufferingOptions) {
    if (!(options.flushInterval > 0 && options.flushInterval <= MAX_FLUSH_INTERVAL)) {
      throw new RangeError(
        `flushInterval must be in (0, ${MAX_FLUSH_INTERVAL}] seconds, got ${options.flushInterval}`
      );
    }
    super(deps);
    this.capacity = options.capacity;
    this.flushInterval = options.flushInterval;
    this.armTimer();
  }

  get state(): BufferState {
    return this._state;
  }

  get size(): number {
    return this.buffer.length;
  }

  emit(record: LogRecord): void {
    if (this.closed) return;
    const points = this.pipeline.process(record);
    if (points.length === 0) return;

    this.buffer.push(...points);
    if (this._state === 'idle') this._state = 'accumulating';

    if (this.buffer.length >= this.capacity) {
      void this.track(this.flush());
    }
  }

  /**
   * Swap the buffer out and write it as one batch. Re-arms the flush timer.
   * A failed batch is reported and dropped, never re-queued.
   */
  async flush(): Promise<void> {
    this.armTimer();
    if (this.buffer.length === 0) return;

    const batch = this.buffer;
    this.buffer = [];
    this.writing++;
    this._state = 'flushing';

    try {
      const ok = await this.deliver(batch);
      if (ok) this.flushes++;
      else this.droppedPoints += batch.length;
    } finally {
      this.writing--;
      if (!this.closed && this.writing === 0) this._state = 'accumulating';
    }
  }

  /**
   * Stop the timer, flush what is left and wait for every in-flight write.
   * Later emits are ignored.
   */
  async close(): Promise<void> {
    if (this.closed) {
      await this.settle();
      return;
    }
    this.closed = true;
    this.cancelled = true;
    this.clearTimer();

    await this.track(this.flush());
    await this.settle();
    this._state = 'closed';
  }

  stats(): BufferStats {
    return {
      state: this._state,
      buffered: this.buffer.length,
      flushes: this.flushes,
      droppedPoints: this.droppedPoints,
    };
  }

  private armTimer(): void {
    this.clearTimer();
    if (this.cancelled) return;
    this.timer = setTimeout(() => this.onTimer(), this.flushInterval * 1000);
    this.timer.unref();
  }

  private onTimer(): void {
    this.timer = undefined;
    if (this.cancelled) return;
    if (this.buffer.length > 0) {
      void this.track(this.flush());
    } else {
      this.armTimer();
    }
  }

  private clearTimer(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  /** True while a flush timer is pending. */
  get timerActive(): boolean {
    return this.timer !== undefined;
  }
}
