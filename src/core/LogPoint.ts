// LogPoint fluent builder and handler factories.
//
// Usage:
//   const handler = new LogPoint()
//     .influx('http://influxdb:8086', { database: 'logs' })
//     .tags(['tenant'])
//     .excludeFields(['password'])
//     .build();
//
//   await handler.emit(createLogRecord({ name: 'app.http', level: 'INFO', message: 'ready' }));
//
//   const buffered = new LogPoint()
//     .influx('http://influxdb:8086', { database: 'logs' })
//     .buildBuffered({ capacity: 128, flushInterval: 2 });

import type { Logger } from 'pino';
import type { KeySelection } from '../types/config.ts';
import type { ErrorReporter } from './diagnostics.ts';
import type { HandlerDeps } from './BaseHandler.ts';
import type { BufferingOptions } from './BufferingInfluxHandler.ts';
import type { HandlerOptions, HandlerOptionsInput } from './config.ts';
import type { PointWriter } from './InfluxWriter.ts';
import { guardReporter, loggingReporter, makeDiagnosticLogger } from './diagnostics.ts';
import { bufferingOptions, classificationOptions, parseHandlerOptions, writeConfig } from './config.ts';
import { compileClassification, isNameList } from '../transform/classify.ts';
import { InfluxWriter } from './InfluxWriter.ts';
import { Pipeline } from './Pipeline.ts';
import { InfluxHandler } from './InfluxHandler.ts';
import { BufferingInfluxHandler } from './BufferingInfluxHandler.ts';

export interface HandlerHooks {
  /** Replaces the HTTP writer built from `database` and `client`. */
  writer?: PointWriter;
  /** Error channel. Defaults to the diagnostic logger. */
  onError?: ErrorReporter;
  logger?: Logger;
}

function resolveDeps(options: HandlerOptions, hooks: HandlerHooks): HandlerDeps {
  const logger = hooks.logger ?? makeDiagnosticLogger();
  const report = guardReporter(hooks.onError ?? loggingReporter(logger), logger);

  let writer = hooks.writer;
  if (!writer) {
    const config = writeConfig(options);
    if (!config) throw new Error('LogPoint: `database` is required unless a writer is supplied');
    writer = new InfluxWriter(config);
  }

  const pipeline = new Pipeline(
    compileClassification(classificationOptions(options)),
    options.backpop,
    report
  );
  return { pipeline, writer, report, logger, lazyInit: options.lazyInit };
}

/** Immediate handler from a plain options object. */
export function createHandler(input: HandlerOptionsInput, hooks: HandlerHooks = {}): InfluxHandler {
  const options = parseHandlerOptions(input);
  return new InfluxHandler(resolveDeps(options, hooks));
}

/** Buffering handler from a plain options object. */
export function createBufferingHandler(
  input: HandlerOptionsInput,
  hooks: HandlerHooks = {}
): BufferingInfluxHandler {
  const options = parseHandlerOptions(input);
  return new BufferingInfluxHandler(resolveDeps(options, hooks), bufferingOptions(options));
}

/** LogPoint fluent builder. */
export class LogPoint {
  private _options: HandlerOptionsInput = {};
  private _hooks: HandlerHooks = {};

  /**
   * Write to an InfluxDB 1.x HTTP endpoint.
   * @param url Base URL, e.g. http://localhost:8086
   * @param options Database plus opaque connection options
   */
  influx(
    url: string,
    options: {
      database: string;
      timeout?: number;
      retentionPolicy?: string;
      username?: string;
      password?: string;
      headers?: Record<string, string>;
      gzip?: boolean;
    }
  ): this {
    const { database, ...client } = options;
    this._options = { ...this._options, database, client: { ...client, url } };
    return this;
  }

  /** Use a custom store client instead of the HTTP writer. */
  writer(writer: PointWriter): this {
    this._hooks = { ...this._hooks, writer };
    return this;
  }

  /** Fixed measurement name instead of the logger-derived one. Disables backpop. */
  measurement(name: string): this {
    return this.set({ measurement: name });
  }

  /** Attributes emitted as tags: names, or a map of attribute → tag key. */
  tags(selection: KeySelection): this {
    return this.set({ includeTags: copySelection(selection) });
  }

  /** Attributes emitted as fields: names, or a map of attribute → field key. */
  fields(selection: KeySelection): this {
    return this.set({ includeFields: copySelection(selection) });
  }

  excludeTags(names: readonly string[]): this {
    return this.set({ excludeTags: [...names] });
  }

  excludeFields(names: readonly string[]): this {
    return this.set({ excludeFields: [...names] });
  }

  extraTags(enabled: boolean): this {
    return this.set({ extraTags: enabled });
  }

  extraFields(enabled: boolean): this {
    return this.set({ extraFields: enabled });
  }

  stacktrace(enabled: boolean): this {
    return this.set({ includeStacktrace: enabled });
  }

  debuggingFields(enabled: boolean): this {
    return this.set({ debuggingFields: enabled });
  }

  levelNames(enabled = true): this {
    return this.set({ levelNames: enabled });
  }

  localname(host: string): this {
    return this.set({ localname: host });
  }

  backpop(enabled: boolean): this {
    return this.set({ backpop: enabled });
  }

  /** Defer the store connection check to the first emit. */
  lazy(enabled = true): this {
    return this.set({ lazyInit: enabled });
  }

  onError(reporter: ErrorReporter): this {
    this._hooks = { ...this._hooks, onError: reporter };
    return this;
  }

  logger(logger: Logger): this {
    this._hooks = { ...this._hooks, logger };
    return this;
  }

  /** Immediate handler. Throws if neither influx() nor writer() was called. */
  build(): InfluxHandler {
    this.assertTarget();
    return createHandler(this._options, this._hooks);
  }

  /** Buffering handler; capacity defaults to 64 points, flushInterval to 5 seconds. */
  buildBuffered(options: Partial<BufferingOptions> = {}): BufferingInfluxHandler {
    this.assertTarget();
    return createBufferingHandler({ ...this._options, ...options }, this._hooks);
  }

  private set(patch: HandlerOptionsInput): this {
    this._options = { ...this._options, ...patch };
    return this;
  }

  private assertTarget(): void {
    if (this._options.database === undefined && !this._hooks.writer) {
      throw new Error('LogPoint: influx() or writer() must be called before build()');
    }
  }
}

function copySelection(selection: KeySelection): string[] | Record<string, string> {
  return isNameList(selection) ? [...selection] : { ...selection };
}
