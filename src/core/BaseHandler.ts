import type { Logger } from 'pino';
import type { Point } from '../types/point.ts';
import type { LogRecord } from '../types/record.ts';
import type { ErrorReporter } from './diagnostics.ts';
import type { PointWriter } from './InfluxWriter.ts';
import type { Pipeline } from './Pipeline.ts';
import { toError } from './diagnostics.ts';

export interface HandlerDeps {
  pipeline: Pipeline;
  writer: PointWriter;
  report: ErrorReporter;
  logger: Logger;
  /** Defer the store connection check to the first emit. */
  lazyInit: boolean;
}

/** Inbound call-in shared by both handlers. */
export interface LogHandler {
  emit(record: LogRecord): void | Promise<void>;
  close(): Promise<void>;
}

export abstract class BaseHandler implements LogHandler {
  protected readonly pipeline: Pipeline;
  protected readonly writer: PointWriter;
  protected readonly report: ErrorReporter;
  protected readonly logger: Logger;
  protected closed = false;

  private connection: Promise<boolean> | undefined;
  private readonly inFlight = new Set<Promise<void>>();

  protected constructor(deps: HandlerDeps) {
    this.pipeline = deps.pipeline;
    this.writer = deps.writer;
    this.report = deps.report;
    this.logger = deps.logger;
    if (!deps.lazyInit) this.openConnection();
  }

  abstract emit(record: LogRecord): void | Promise<void>;
  abstract close(): Promise<void>;

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Resolves true once the store answered a connection check. Concurrent
   * callers share one attempt; a failed attempt is retried by the next caller.
   */
  protected ensureConnected(): Promise<boolean> {
    return this.connection ?? this.openConnection();
  }

  /** Write one batch; failures are reported, never thrown. Returns success. */
  protected async deliver(points: readonly Point[]): Promise<boolean> {
    if (!(await this.ensureConnected())) {
      this.logger.debug({ points: points.length }, 'store not connected, batch dropped');
      return false;
    }
    try {
      await this.writer.write(points);
      this.logger.debug({ points: points.length }, 'batch written');
      return true;
    } catch (err) {
      this.report(toError(err));
      return false;
    }
  }

  /** Keep a handle on background work so close() can wait for it. */
  protected track<T>(task: Promise<T>): Promise<T> {
    const settled = task.then(
      () => undefined,
      () => undefined
    );
    this.inFlight.add(settled);
    void settled.then(() => this.inFlight.delete(settled));
    return task;
  }

  protected async settle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private openConnection(): Promise<boolean> {
    const attempt = this.track(this.connect());
    this.connection = attempt;
    void attempt.then((ok) => {
      if (!ok && this.connection === attempt) this.connection = undefined;
    });
    return attempt;
  }

  private async connect(): Promise<boolean> {
    try {
      await this.writer.connect();
      this.logger.debug('store connection established');
      return true;
    } catch (err) {
      this.report(toError(err));
      return false;
    }
  }
}
