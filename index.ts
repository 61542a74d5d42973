// logpoint — structured log records → InfluxDB points

// Builder and factories
export { LogPoint, createHandler, createBufferingHandler } from './src/core/LogPoint.ts';
export type { HandlerHooks } from './src/core/LogPoint.ts';

// Handlers
export { InfluxHandler } from './src/core/InfluxHandler.ts';
export { BufferingInfluxHandler } from './src/core/BufferingInfluxHandler.ts';
export type { BufferState, BufferStats, BufferingOptions } from './src/core/BufferingInfluxHandler.ts';
export type { LogHandler, HandlerDeps } from './src/core/BaseHandler.ts';

// Pipeline (for advanced/testing use)
export { Pipeline, expandBackpop } from './src/core/Pipeline.ts';

// Store client
export { InfluxWriter, toInfluxPoint } from './src/core/InfluxWriter.ts';
export type { PointWriter } from './src/core/InfluxWriter.ts';
export type { InfluxWriteConfig } from './src/core/InfluxWriteConfig.ts';

// Configuration
export { HandlerOptionsSchema, ClientOptionsSchema, parseHandlerOptions } from './src/core/config.ts';
export type { HandlerOptions, HandlerOptionsInput } from './src/core/config.ts';

// Errors and diagnostics
export {
  LogPointError,
  ClassificationError,
  MalformedPointError,
  DeliveryError,
} from './src/core/errors.ts';
export type { LogPointErrorCode } from './src/core/errors.ts';
export { makeDiagnosticLogger, makeNoopLogger, loggingReporter } from './src/core/diagnostics.ts';
export type { ErrorReporter } from './src/core/diagnostics.ts';

// Adapters
export { fromPinoLog, pinoDestination, pinoLevel } from './src/adapters/pino.ts';
export type { PinoAdapterOptions, PinoDestinationOptions, LineDestination } from './src/adapters/pino.ts';

// Types
export { createLogRecord } from './src/types/record.ts';
export type { LogRecord, LogRecordInit, RecordContext, Severity } from './src/types/record.ts';
export type { Point, FieldValue, ClassifiedRecord } from './src/types/point.ts';
export type { ClassificationOptions, ClassificationConfig, KeySelection } from './src/types/config.ts';

// Transform utilities (for advanced use)
export { classify, compileClassification, measurementFor, toNanoseconds } from './src/transform/classify.ts';
export type { Classification } from './src/transform/classify.ts';
export { buildPoint, withMeasurement } from './src/transform/buildPoint.ts';
export { rewriteHierarchy, ancestors } from './src/transform/hierarchy.ts';
export { SYSLOG_LEVELS, SEVERITIES, levelTag, parseLevelTag } from './src/transform/levels.ts';

