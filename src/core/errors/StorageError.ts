import { BaseError } from "./BaseError";

export enum StorageErrorCode {
  TRANSACTION_FAILED = "STORAGE_TRANSACTION_FAILED",
  INSERT_FAILED = "STORAGE_INSERT_FAILED",
  COMMIT_FAILED = "STORAGE_COMMIT_FAILED",
  QUERY_FAILED = "STORAGE_QUERY_FAILED",
}

/**
 * Database error. Never fatal: the flusher retries on its next cycle.
 */
export class StorageError extends BaseError {
  constructor(
    message: string,
    code: StorageErrorCode,
    context?: Record<string, unknown>,
  ) {
    super(message, code, true, context);
  }

  static transactionFailed(error: Error): StorageError {
    return new StorageError(
      `Failed to start db transaction: ${error.message}`,
      StorageErrorCode.TRANSACTION_FAILED,
      { originalError: error.message },
    );
  }

  static insertFailed(index: number, error: Error): StorageError {
    return new StorageError(
      `Failed to insert record ${index} to DB: ${error.message}`,
      StorageErrorCode.INSERT_FAILED,
      { index, originalError: error.message },
    );
  }

  static commitFailed(error: Error): StorageError {
    return new StorageError(
      `Failed to commit db transaction: ${error.message}`,
      StorageErrorCode.COMMIT_FAILED,
      { originalError: error.message },
    );
  }

  static queryFailed(error: Error): StorageError {
    return new StorageError(
      `Query failed: ${error.message}`,
      StorageErrorCode.QUERY_FAILED,
      { originalError: error.message },
    );
  }
}
