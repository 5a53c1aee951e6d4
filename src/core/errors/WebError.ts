import { BaseError } from "./BaseError";

/**
 * Web-related error codes
 */
export enum WebErrorCode {
  SERVER_START_FAILED = "WEB_SERVER_START_FAILED",
  SERVER_STOP_FAILED = "WEB_SERVER_STOP_FAILED",
  SERVER_NOT_RUNNING = "WEB_SERVER_NOT_RUNNING",
  PORT_IN_USE = "WEB_PORT_IN_USE",
  RENDER_FAILED = "WEB_RENDER_FAILED",
}

/**
 * Web Service Error
 */
export class WebError extends BaseError {
  /**
   * HTTP status code associated with this error
   */
  public readonly statusCode?: number;

  constructor(
    message: string,
    code: WebErrorCode,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
    statusCode?: number,
  ) {
    super(message, code, recoverable, context);
    this.statusCode = statusCode;
  }

  static serverStartFailed(port: number, error: Error): WebError {
    return new WebError(
      `Failed to start web server on port ${port}: ${error.message}`,
      WebErrorCode.SERVER_START_FAILED,
      false,
      { port, originalError: error.message },
      500,
    );
  }

  static serverStopFailed(error: Error): WebError {
    return new WebError(
      `Failed to stop web server: ${error.message}`,
      WebErrorCode.SERVER_STOP_FAILED,
      true,
      { originalError: error.message },
      500,
    );
  }

  static portInUse(port: number): WebError {
    return new WebError(
      `Port ${port} is already in use`,
      WebErrorCode.PORT_IN_USE,
      false,
      { port },
      500,
    );
  }

  static serverNotRunning(): WebError {
    return new WebError(
      "Web server is not running",
      WebErrorCode.SERVER_NOT_RUNNING,
      true,
    );
  }

  static renderFailed(error: Error): WebError {
    return new WebError(
      `Error rendering web page: ${error.message}`,
      WebErrorCode.RENDER_FAILED,
      true,
      { originalError: error.message },
      500,
    );
  }
}
