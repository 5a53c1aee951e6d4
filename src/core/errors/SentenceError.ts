import { BaseError } from "./BaseError";

/**
 * NMEA sentence decoding error codes
 */
export enum SentenceErrorCode {
  // Framing errors
  PARSE_ERROR = "SENTENCE_PARSE_ERROR",
  CHECKSUM_ERROR = "SENTENCE_CHECKSUM_ERROR",

  // Field errors
  FIELD_COUNT = "SENTENCE_FIELD_COUNT",
  INVALID_FIELD = "SENTENCE_INVALID_FIELD",

  // Valid framing, type we do not decode
  UNSUPPORTED_TYPE = "SENTENCE_UNSUPPORTED_TYPE",
}

/**
 * Error produced when a single line of telemetry cannot be decoded.
 * Always recoverable: the offending line is skipped.
 */
export class SentenceError extends BaseError {
  constructor(
    message: string,
    code: SentenceErrorCode = SentenceErrorCode.PARSE_ERROR,
    context?: Record<string, unknown>,
  ) {
    super(message, code, true, context);
  }

  /**
   * Line is not a `$`-prefixed sentence with a checksum separator
   */
  static malformed(sentence: string, reason: string): SentenceError {
    return new SentenceError(
      `Malformed NMEA sentence: ${reason}`,
      SentenceErrorCode.PARSE_ERROR,
      { sentence: sentence.substring(0, 100), reason },
    );
  }

  static checksumMismatch(
    sentence: string,
    expected: string,
    actual: string,
  ): SentenceError {
    return new SentenceError(
      `Checksum mismatch (expected ${expected}, got ${actual})`,
      SentenceErrorCode.CHECKSUM_ERROR,
      { sentence: sentence.substring(0, 100), expected, actual },
    );
  }

  static fieldCount(type: string, expected: number, actual: number): SentenceError {
    return new SentenceError(
      `${type} sentence needs ${expected} fields, got ${actual}`,
      SentenceErrorCode.FIELD_COUNT,
      { type, expected, actual },
    );
  }

  static invalidField(type: string, field: string, value: string): SentenceError {
    return new SentenceError(
      `${type} sentence has invalid ${field}: "${value}"`,
      SentenceErrorCode.INVALID_FIELD,
      { type, field, value },
    );
  }

  static unsupportedType(type: string): SentenceError {
    return new SentenceError(
      `Unsupported sentence type: ${type}`,
      SentenceErrorCode.UNSUPPORTED_TYPE,
      { type },
    );
  }

  /**
   * True for a well-formed sentence of a type we do not keep
   */
  isUnsupportedType(): boolean {
    return this.code === SentenceErrorCode.UNSUPPORTED_TYPE;
  }
}
