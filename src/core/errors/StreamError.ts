import { BaseError } from "./BaseError";

/**
 * Device stream error codes
 */
export enum StreamErrorCode {
  CONNECT_FAILED = "STREAM_CONNECT_FAILED",
  READ_FAILED = "STREAM_READ_FAILED",
  END_OF_STREAM = "STREAM_END_OF_STREAM",
  BAD_RESPONSE = "STREAM_BAD_RESPONSE",
  ALREADY_RUNNING = "STREAM_ALREADY_RUNNING",
}

/**
 * Transport fault on the connection to the device. Recovered by the
 * reader's reconnect loop.
 */
export class StreamError extends BaseError {
  constructor(
    message: string,
    code: StreamErrorCode = StreamErrorCode.READ_FAILED,
    context?: Record<string, unknown>,
  ) {
    super(message, code, true, context);
  }

  static connectFailed(endpoint: string, error: Error): StreamError {
    return new StreamError(
      `Failed to connect to ${endpoint}: ${error.message}`,
      StreamErrorCode.CONNECT_FAILED,
      { endpoint, originalError: error.message },
    );
  }

  static readFailed(error: Error): StreamError {
    return new StreamError(
      `Failed to read from device stream: ${error.message}`,
      StreamErrorCode.READ_FAILED,
      { originalError: error.message },
    );
  }

  static endOfStream(): StreamError {
    return new StreamError(
      "Reached end of connection to device",
      StreamErrorCode.END_OF_STREAM,
    );
  }

  static badResponse(reason: string): StreamError {
    return new StreamError(
      `Unexpected response from device: ${reason}`,
      StreamErrorCode.BAD_RESPONSE,
      { reason },
    );
  }

  static alreadyRunning(): StreamError {
    return new StreamError(
      "Stream reader is already running",
      StreamErrorCode.ALREADY_RUNNING,
    );
  }
}
