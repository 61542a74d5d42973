/**
 * Handler configuration surface, validated once at construction.
 * Invalid options throw a ZodError here; nothing after construction throws.
 */

import { z } from 'zod';
import type { ClassificationOptions } from '../types/config.ts';
import type { InfluxWriteConfig } from './InfluxWriteConfig.ts';
import type { BufferingOptions } from './BufferingInfluxHandler.ts';
import { MAX_FLUSH_INTERVAL } from './BufferingInfluxHandler.ts';

const keySelection = z.union([z.array(z.string().min(1)), z.record(z.string().min(1))]);

export const ClientOptionsSchema = z.object({
  url: z.string().url().default('http://localhost:8086'),
  timeout: z.number().int().positive().default(10_000),
  retentionPolicy: z.string().min(1).optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  headers: z.record(z.string()).optional(),
  gzip: z.boolean().default(false),
});

export const HandlerOptionsSchema = z.object({
  database: z.string().min(1).optional(),
  measurement: z.string().min(1).optional(),
  lazyInit: z.boolean().default(false),
  includeFields: keySelection.default([]),
  excludeFields: z.array(z.string()).default([]),
  includeTags: keySelection.default([]),
  excludeTags: z.array(z.string()).default([]),
  extraFields: z.boolean().default(true),
  extraTags: z.boolean().default(false),
  includeStacktrace: z.boolean().default(true),
  debuggingFields: z.boolean().default(true),
  backpop: z.boolean().default(true),
  levelNames: z.boolean().default(false),
  localname: z.string().min(1).optional(),
  hierarchyDelimiter: z.string().min(1).default('.'),
  measurementDelimiter: z.string().min(1).default(':'),
  capacity: z.number().int().positive().default(64),
  flushInterval: z.number().positive().max(MAX_FLUSH_INTERVAL).default(5),
  client: ClientOptionsSchema.default({}),
});

export type HandlerOptionsInput = z.input<typeof HandlerOptionsSchema>;
export type HandlerOptions = z.output<typeof HandlerOptionsSchema>;

export function parseHandlerOptions(input: unknown): HandlerOptions {
  return HandlerOptionsSchema.parse(input);
}

export function classificationOptions(options: HandlerOptions): ClassificationOptions {
  return {
    measurement: options.measurement,
    includeTags: options.includeTags,
    includeFields: options.includeFields,
    excludeTags: options.excludeTags,
    excludeFields: options.excludeFields,
    extraTags: options.extraTags,
    extraFields: options.extraFields,
    includeStacktrace: options.includeStacktrace,
    debuggingFields: options.debuggingFields,
    levelNames: options.levelNames,
    localname: options.localname,
    hierarchyDelimiter: options.hierarchyDelimiter,
    measurementDelimiter: options.measurementDelimiter,
  };
}

/** Store connection options, or undefined when no database was named. */
export function writeConfig(options: HandlerOptions): InfluxWriteConfig | undefined {
  if (options.database === undefined) return undefined;
  return { ...options.client, database: options.database };
}

export function bufferingOptions(options: HandlerOptions): BufferingOptions {
  return { capacity: options.capacity, flushInterval: options.flushInterval };
}
