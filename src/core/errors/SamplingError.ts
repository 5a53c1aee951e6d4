import { BaseError } from "./BaseError";

export enum SamplingErrorCode {
  /** RMC or GGA fragment missing, nothing to sample */
  NO_DATA_TO_LOG = "SAMPLING_NO_DATA_TO_LOG",
  INVALID_DEVICE_TIMESTAMP = "SAMPLING_INVALID_DEVICE_TIMESTAMP",
}

/**
 * A sampling cycle that produced no record. The cycle is skipped.
 */
export class SamplingError extends BaseError {
  constructor(
    message: string,
    code: SamplingErrorCode,
    context?: Record<string, unknown>,
  ) {
    super(message, code, true, context);
  }

  static noDataToLog(missing: string[]): SamplingError {
    return new SamplingError(
      `No data to log (missing ${missing.join(", ")})`,
      SamplingErrorCode.NO_DATA_TO_LOG,
      { missing },
    );
  }

  static invalidDeviceTimestamp(value: string): SamplingError {
    return new SamplingError(
      `Failed to parse RMC date time "${value}"`,
      SamplingErrorCode.INVALID_DEVICE_TIMESTAMP,
      { value },
    );
  }

  isNoData(): boolean {
    return this.code === SamplingErrorCode.NO_DATA_TO_LOG;
  }
}
