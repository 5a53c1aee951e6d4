import { ConfigError, ConfigErrorCode } from "@core/errors";

describe("ConfigError", () => {
  it("should create a missing field error", () => {
    const error = ConfigError.missingField("GPS_DB_CONNECTION_STRING");

    expect(error.code).toBe(ConfigErrorCode.MISSING_REQUIRED_FIELD);
    expect(error.message).toBe(
      "Missing required configuration: GPS_DB_CONNECTION_STRING",
    );
    expect(error.context).toEqual({ field: "GPS_DB_CONNECTION_STRING" });
  });

  it("should create an invalid value error", () => {
    const error = ConfigError.invalidValue("WEB_PORT", "abc", "must be a number");

    expect(error.code).toBe(ConfigErrorCode.INVALID_VALUE);
    expect(error.message).toBe(
      "Invalid value for WEB_PORT: abc (must be a number)",
    );
  });

  it("should never be recoverable", () => {
    expect(ConfigError.missingField("X").recoverable).toBe(false);
    expect(ConfigError.invalidValue("X", 1, "bad").recoverable).toBe(false);
  });
});
