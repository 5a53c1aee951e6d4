import { parseDeviceTimestamp } from "@services/logging/deviceTime";

describe("parseDeviceTimestamp", () => {
  it("should parse date and time as UTC", () => {
    expect(parseDeviceTimestamp("15/06/24T10:30:00.000")?.toISOString()).toBe(
      "2024-06-15T10:30:00.000Z",
    );
  });

  it("should accept a time without fraction", () => {
    expect(parseDeviceTimestamp("23/03/94T12:35:19")?.toISOString()).toBe(
      "1994-03-23T12:35:19.000Z",
    );
  });

  it("should truncate fractions beyond milliseconds", () => {
    expect(parseDeviceTimestamp("31/12/68T23:59:59.9999")?.toISOString()).toBe(
      "2068-12-31T23:59:59.999Z",
    );
  });

  it("should map years 69-99 to the twentieth century", () => {
    expect(parseDeviceTimestamp("01/01/69T00:00:00")?.toISOString()).toBe(
      "1969-01-01T00:00:00.000Z",
    );
  });

  it.each([
    ["an impossible day", "31/02/94T12:00:00"],
    ["hour 24", "15/06/24T24:00:00"],
    ["a missing date", "T10:30:00.000"],
    ["an ISO timestamp", "2024-06-15T10:30:00Z"],
  ])("should reject %s", (_name, value) => {
    expect(parseDeviceTimestamp(value)).toBeNull();
  });
});
