import { getUserMessage as getErrorUserMessage } from "./ErrorMessages";

/**
 * Base error class for all custom errors in the application
 * Extends Error to maintain stack traces and instanceof checks
 */
export abstract class BaseError extends Error {
  /**
   * Error code for categorization
   */
  public readonly code: string;

  /**
   * Timestamp when error occurred
   */
  public readonly timestamp: Date;

  /**
   * Additional context about the error
   */
  public readonly context?: Record<string, unknown>;

  /**
   * Whether the process can carry on after this error
   */
  public readonly recoverable: boolean;

  constructor(
    message: string,
    code: string,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message);

    Error.captureStackTrace(this, this.constructor);

    // Set the prototype explicitly for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = this.constructor.name;
    this.code = code;
    this.timestamp = new Date();
    this.recoverable = recoverable;
    this.context = context;
  }

  /**
   * Convert error to a plain object for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      recoverable: this.recoverable,
      context: this.context,
      stack: this.stack,
    };
  }

  /**
   * Get a user-facing message from the central ErrorMessages table,
   * falling back to a generic message for unknown codes.
   */
  getUserMessage(): string {
    return getErrorUserMessage(this.code);
  }
}
