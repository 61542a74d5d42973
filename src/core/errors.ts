/**
 * Error hierarchy for logpoint.
 *
 * None of these reach application code: handlers hand them to the
 * configured error reporter and drop the affected attribute, point or batch.
 */

export type LogPointErrorCode = 'CLASSIFICATION' | 'MALFORMED_POINT' | 'DELIVERY';

export class LogPointError extends Error {
  public readonly code: LogPointErrorCode;

  constructor(message: string, code: LogPointErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LogPointError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
    };
  }
}

/** A record attribute that cannot be emitted; the attribute is skipped. */
export class ClassificationError extends LogPointError {
  public readonly attribute: string;

  constructor(attribute: string, reason: string) {
    super(`Attribute "${attribute}" skipped: ${reason}`, 'CLASSIFICATION');
    this.name = 'ClassificationError';
    this.attribute = attribute;
  }
}

/** Tag/field key collision or a missing mandatory key; the point is dropped. */
export class MalformedPointError extends LogPointError {
  public readonly measurement: string;

  constructor(measurement: string, reason: string) {
    super(`Malformed point for "${measurement}": ${reason}`, 'MALFORMED_POINT');
    this.name = 'MalformedPointError';
    this.measurement = measurement;
  }
}

/** Store unreachable, batch rejected or timed out; the batch is dropped. */
export class DeliveryError extends LogPointError {
  public readonly status: number | undefined;
  public readonly pointCount: number;

  constructor(
    message: string,
    details: { status?: number; pointCount: number; cause?: unknown }
  ) {
    super(message, 'DELIVERY', { cause: details.cause });
    this.name = 'DeliveryError';
    this.status = details.status;
    this.pointCount = details.pointCount;
  }

  override toJSON() {
    return { ...super.toJSON(), status: this.status, pointCount: this.pointCount };
  }
}
