/**
 * Default Configuration Constants
 *
 * Default values for every setting ConfigService reads from the
 * environment, grouped by the component that uses them.
 */

// =============================================================================
// Device Stream Defaults
// =============================================================================

/**
 * Address of the hotspot's GPS telemetry endpoint on its own LAN
 */
export const DEVICE_DEFAULT_HOST = "192.168.1.1";

export const DEVICE_DEFAULT_PORT = 11010;

export const DEVICE_DEFAULT_PATH = "/";

/**
 * Wait after a failed session before reconnecting (1 minute)
 */
export const STREAM_DEFAULT_RECONNECT_DELAY_MS = 60_000;

/**
 * Fabricated response head injected ahead of the device's header-less reply
 */
export const STREAM_RESPONSE_PREAMBLE =
  "HTTP/1.1 200 OK\r\nConnection: keep-alive\r\nContent-Type: text/plain\r\n\r\n";

/**
 * Largest response head accepted before the body starts
 */
export const STREAM_MAX_HEAD_BYTES = 8 * 1024;

// =============================================================================
// Sampling / Persistence Defaults
// =============================================================================

/**
 * Delay before the first sample (10 seconds)
 */
export const SAMPLE_DEFAULT_INITIAL_DELAY_MS = 10_000;

/**
 * Interval between samples (15 minutes)
 */
export const SAMPLE_DEFAULT_INTERVAL_MS = 15 * 60_000;

/**
 * Interval between flushes to the database (5 minutes)
 */
export const FLUSH_DEFAULT_INTERVAL_MS = 5 * 60_000;

/**
 * Records kept in memory while the database is unreachable.
 * 100 samples at the default interval cover a little over a day.
 */
export const QUEUE_DEFAULT_CAPACITY = 100;

/**
 * Spatial reference of stored points (WGS 84)
 */
export const STORAGE_SRID = 4326;

// =============================================================================
// Web Defaults
// =============================================================================

export const WEB_DEFAULT_HOST = "0.0.0.0";

export const WEB_DEFAULT_PORT = 8080;

// =============================================================================
// Process Defaults
// =============================================================================

/**
 * Force exit if graceful shutdown takes longer than this
 */
export const SHUTDOWN_TIMEOUT_MS = 10_000;
