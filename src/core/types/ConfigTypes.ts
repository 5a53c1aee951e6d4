/**
 * Device telemetry endpoint
 */
export type DeviceConfig = {
  host: string;
  port: number;
  /** Request path sent in the request line */
  path: string;
  /** Wait between a failed session and the next connection attempt */
  reconnectDelayMs: number;
};

export type DatabaseConfig = {
  connectionString: string;
};

export type LoggingScheduleConfig = {
  /** Delay before the first sample so early fixes can arrive */
  sampleInitialDelayMs: number;
  sampleIntervalMs: number;
  flushIntervalMs: number;
  /** Maximum number of records kept while the database is unreachable */
  queueCapacity: number;
};

export type WebConfig = {
  host: string;
  port: number;
  /** Enables the embedded map on the status page */
  mapsApiKey?: string;
};

export type AppConfig = {
  device: DeviceConfig;
  database: DatabaseConfig;
  logging: LoggingScheduleConfig;
  web: WebConfig;
};
