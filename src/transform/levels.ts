import type { Severity } from '../types/record.ts';

/** Syslog severity codes (RFC 5424) for each record level. */
export const SYSLOG_LEVELS: Readonly<Record<Severity, number>> = Object.freeze({
  CRITICAL: 2,
  ERROR: 3,
  WARNING: 4,
  INFO: 6,
  DEBUG: 7,
});

export const SEVERITIES = Object.freeze([
  'CRITICAL',
  'ERROR',
  'WARNING',
  'INFO',
  'DEBUG',
] as const satisfies readonly Severity[]);

/** Render the `level` tag value. */
export function levelTag(level: Severity, levelNames: boolean): string {
  return levelNames ? level : String(SYSLOG_LEVELS[level]);
}

/** Inverse of levelTag over either rendering. */
export function parseLevelTag(value: string): Severity | undefined {
  for (const severity of SEVERITIES) {
    if (value === severity || value === String(SYSLOG_LEVELS[severity])) return severity;
  }
  return undefined;
}

export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && Object.hasOwn(SYSLOG_LEVELS, value);
}
