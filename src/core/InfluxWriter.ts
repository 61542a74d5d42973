/**
 * Store client seam and its InfluxDB implementation on @influxdata/influxdb-client.
 *
 * write():
 *  1. Skip empty batches
 *  2. Convert points to client points (the client owns line protocol)
 *  3. Open a write API sized to the batch, so it goes out in one request
 *  4. close() flushes it; a failure rejects with DeliveryError
 *
 * Talks to the 1.x compatibility endpoint (/api/v2/write, InfluxDB 1.8+ and 2.x):
 * bucket is "database[/retention policy]", token is "username:password".
 */

import { HttpError, InfluxDB, Point as InfluxPoint } from '@influxdata/influxdb-client';
import type { WriteOptions } from '@influxdata/influxdb-client';
import type { Point } from '../types/point.ts';
import type { InfluxWriteConfig } from './InfluxWriteConfig.ts';
import { DeliveryError } from './errors.ts';

/** Outbound call-out: "write one batch of points". */
export interface PointWriter {
  /** Verify the store is reachable. Rejects with DeliveryError. */
  connect(): Promise<void>;
  /** Write one batch in one request. Rejects with DeliveryError. */
  write(points: readonly Point[]): Promise<void>;
}

export function toInfluxPoint(point: Point): InfluxPoint {
  const out = new InfluxPoint(point.measurement).timestamp(point.timestamp.toString());
  for (const [key, value] of Object.entries(point.tags)) out.tag(key, value);
  for (const [key, value] of Object.entries(point.fields)) {
    if (typeof value === 'string') out.stringField(key, value);
    else if (typeof value === 'boolean') out.booleanField(key, value);
    else if (typeof value === 'bigint') out.intField(key, Number(value));
    else out.floatField(key, value);
  }
  return out;
}

export class InfluxWriter implements PointWriter {
  private readonly client: InfluxDB;
  private readonly bucket: string;

  constructor(private readonly config: InfluxWriteConfig) {
    this.client = new InfluxDB({
      url: config.url.replace(/\/+$/, ''),
      token: credentials(config),
      timeout: config.timeout,
    });
    this.bucket = config.retentionPolicy
      ? `${config.database}/${config.retentionPolicy}`
      : config.database;
  }

  get database(): string {
    return this.config.database;
  }

  async connect(): Promise<void> {
    try {
      await this.client.transport.request('/ping', undefined, { method: 'GET' });
    } catch (err) {
      throw deliveryError('ping', err, 0);
    }
  }

  async write(points: readonly Point[]): Promise<void> {
    if (points.length === 0) return;

    const writeApi = this.client.getWriteApi('', this.bucket, 'ns', this.writeOptions(points.length));
    try {
      writeApi.writePoints(points.map(toInfluxPoint));
      await writeApi.close();
    } catch (err) {
      throw deliveryError('write', err, points.length);
    }
  }

  private writeOptions(batchSize: number): Partial<WriteOptions> {
    return {
      batchSize: batchSize + 1,
      flushInterval: 0,
      maxRetries: 0,
      gzipThreshold: this.config.gzip ? 0 : Number.POSITIVE_INFINITY,
      headers: this.config.headers,
    };
  }
}

function credentials(config: InfluxWriteConfig): string | undefined {
  if (config.username === undefined && config.password === undefined) return undefined;
  return `${config.username ?? ''}:${config.password ?? ''}`;
}

function deliveryError(operation: 'ping' | 'write', err: unknown, pointCount: number): DeliveryError {
  if (err instanceof HttpError) {
    const detail = `Store ${operation} failed: HTTP ${err.statusCode} ${err.body ?? ''}`;
    return new DeliveryError(detail.trim().slice(0, 500), {
      status: err.statusCode,
      pointCount,
      cause: err,
    });
  }
  const msg = err instanceof Error ? err.message : String(err);
  return new DeliveryError(`Store request error: ${msg}`, { pointCount, cause: err });
}
