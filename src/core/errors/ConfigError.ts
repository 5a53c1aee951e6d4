import { BaseError } from "./BaseError";

/**
 * Config-related error codes
 */
export enum ConfigErrorCode {
  MISSING_REQUIRED_FIELD = "CONFIG_MISSING_REQUIRED_FIELD",
  INVALID_VALUE = "CONFIG_INVALID_VALUE",
}

/**
 * Startup configuration error. Always fatal.
 */
export class ConfigError extends BaseError {
  constructor(
    message: string,
    code: ConfigErrorCode = ConfigErrorCode.INVALID_VALUE,
    context?: Record<string, unknown>,
  ) {
    super(message, code, false, context);
  }

  /**
   * Create error for missing required setting
   */
  static missingField(field: string): ConfigError {
    return new ConfigError(
      `Missing required configuration: ${field}`,
      ConfigErrorCode.MISSING_REQUIRED_FIELD,
      { field },
    );
  }

  /**
   * Create error for invalid value
   */
  static invalidValue(field: string, value: unknown, reason: string): ConfigError {
    return new ConfigError(
      `Invalid value for ${field}: ${String(value)} (${reason})`,
      ConfigErrorCode.INVALID_VALUE,
      { field, value, reason },
    );
  }
}
