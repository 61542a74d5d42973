/**
 * Connection options for the InfluxDB write endpoint.
 * Passed through to the store client as-is; logpoint does not interpret credentials.
 */
export interface InfluxWriteConfig {
  url: string; // e.g. http://localhost:8086
  database: string;
  timeout: number; // milliseconds
  retentionPolicy?: string;
  username?: string;
  password?: string;
  headers?: Record<string, string>;
  gzip?: boolean;
}
