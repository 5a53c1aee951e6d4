/**
 * Type guards and utilities for safe type narrowing
 */

import { GPSFixQuality } from "@core/types/FixTypes";

/**
 * Convert an unknown caught error to an Error instance.
 *
 * @example
 * ```ts
 * try {
 *   await client.query("BEGIN");
 * } catch (err) {
 *   return failure(StorageError.transactionFailed(toError(err)));
 * }
 * ```
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  if (typeof error === "string") {
    return new Error(error);
  }
  if (typeof error === "object" && error !== null && "message" in error) {
    return new Error(String(error.message));
  }
  return new Error(String(error));
}

/**
 * Type guard for Node.js system errors (ECONNREFUSED, EADDRINUSE, ...)
 */
export function isNodeJSErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    ("code" in error || "errno" in error || "syscall" in error)
  );
}

/**
 * Type guard for GPSFixQuality enum values.
 */
export function isGPSFixQuality(value: number): value is GPSFixQuality {
  return (
    Number.isInteger(value) &&
    value >= GPSFixQuality.NO_FIX &&
    value <= GPSFixQuality.SIMULATION
  );
}

/**
 * Convert a GGA quality field to GPSFixQuality, defaulting to NO_FIX
 */
export function toGPSFixQuality(value: number): GPSFixQuality {
  if (isGPSFixQuality(value)) {
    return value;
  }
  return GPSFixQuality.NO_FIX;
}

/**
 * Exhaustiveness check for switches over closed unions
 */
export function assertNever(value: never, what: string): never {
  throw new Error(`Unhandled ${what}: ${JSON.stringify(value)}`);
}
