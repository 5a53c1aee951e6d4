import { BaseError } from "./BaseError";

export enum QueueErrorCode {
  DRAIN_IN_PROGRESS = "QUEUE_DRAIN_IN_PROGRESS",
  WRITE_FAILED = "QUEUE_WRITE_FAILED",
}

/**
 * Outbound queue errors. A failed write keeps the whole batch queued.
 */
export class QueueError extends BaseError {
  constructor(
    message: string,
    code: QueueErrorCode,
    context?: Record<string, unknown>,
  ) {
    super(message, code, true, context);
  }

  static drainInProgress(): QueueError {
    return new QueueError(
      "A drain of the outbound queue is already in progress",
      QueueErrorCode.DRAIN_IN_PROGRESS,
    );
  }

  static writeFailed(batchSize: number, error: Error): QueueError {
    return new QueueError(
      `Failed to write ${batchSize} queued record(s): ${error.message}`,
      QueueErrorCode.WRITE_FAILED,
      { batchSize, originalError: error.message },
    );
  }
}
