/**
 * Error classes for the hotspot GPS logger
 *
 * All custom errors extend BaseError and carry a code, a timestamp,
 * optional context and a recoverable flag. Only ConfigError is fatal.
 */

export * from "./BaseError";
export * from "./SentenceError";
export * from "./StreamError";
export * from "./SamplingError";
export * from "./QueueError";
export * from "./StorageError";
export * from "./ConfigError";
export * from "./WebError";
export * from "./ErrorMessages";
