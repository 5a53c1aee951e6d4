/**
 * Centralized user-facing messages for all error codes.
 *
 * Codes are repeated here as string literals so this module does not import
 * the error classes (which import it through BaseError).
 */

export const SENTENCE_ERROR_MESSAGES: Record<string, string> = {
  SENTENCE_PARSE_ERROR: "Received a malformed GPS sentence.",
  SENTENCE_CHECKSUM_ERROR: "GPS sentence checksum did not match.",
  SENTENCE_FIELD_COUNT: "GPS sentence is missing fields.",
  SENTENCE_INVALID_FIELD: "GPS sentence contains an invalid value.",
  SENTENCE_UNSUPPORTED_TYPE: "GPS sentence type is not used.",
};

export const STREAM_ERROR_MESSAGES: Record<string, string> = {
  STREAM_CONNECT_FAILED: "Cannot reach the hotspot GPS. Retrying shortly.",
  STREAM_READ_FAILED: "Lost the GPS stream. Reconnecting shortly.",
  STREAM_END_OF_STREAM: "The hotspot closed the GPS stream. Reconnecting shortly.",
  STREAM_BAD_RESPONSE: "The hotspot sent an unexpected response.",
  STREAM_ALREADY_RUNNING: "The GPS stream is already running.",
};

export const SAMPLING_ERROR_MESSAGES: Record<string, string> = {
  SAMPLING_NO_DATA_TO_LOG: "No GPS fix to log yet.",
  SAMPLING_INVALID_DEVICE_TIMESTAMP: "GPS reported an invalid date or time.",
};

export const QUEUE_ERROR_MESSAGES: Record<string, string> = {
  QUEUE_DRAIN_IN_PROGRESS: "Queued locations are already being saved.",
  QUEUE_WRITE_FAILED: "Queued locations could not be saved. Will retry.",
};

export const STORAGE_ERROR_MESSAGES: Record<string, string> = {
  STORAGE_TRANSACTION_FAILED: "Database is unavailable. Will retry.",
  STORAGE_INSERT_FAILED: "Failed to save a location. Will retry.",
  STORAGE_COMMIT_FAILED: "Failed to save locations. Will retry.",
  STORAGE_QUERY_FAILED: "Database query failed.",
};

export const CONFIG_ERROR_MESSAGES: Record<string, string> = {
  CONFIG_MISSING_REQUIRED_FIELD: "A required setting is missing.",
  CONFIG_INVALID_VALUE: "A setting has an invalid value.",
};

export const WEB_ERROR_MESSAGES: Record<string, string> = {
  WEB_SERVER_START_FAILED: "Failed to start the status page.",
  WEB_SERVER_STOP_FAILED: "Failed to stop the status page.",
  WEB_SERVER_NOT_RUNNING: "The status page is not running.",
  WEB_PORT_IN_USE: "The status page port is already in use.",
  WEB_RENDER_FAILED: "Failed to render the status page.",
};

const ALL_ERROR_MESSAGES: Record<string, string> = {
  ...SENTENCE_ERROR_MESSAGES,
  ...STREAM_ERROR_MESSAGES,
  ...SAMPLING_ERROR_MESSAGES,
  ...QUEUE_ERROR_MESSAGES,
  ...STORAGE_ERROR_MESSAGES,
  ...CONFIG_ERROR_MESSAGES,
  ...WEB_ERROR_MESSAGES,
};

export const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";

/**
 * Look up the user-facing message for an error code
 */
export function getUserMessage(code: string): string {
  return ALL_ERROR_MESSAGES[code] ?? DEFAULT_ERROR_MESSAGE;
}
