import { formatLoggedLocation } from "../latestLocation";

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

describe("formatLoggedLocation", () => {
  it("should print both timestamps and the point coordinates", () => {
    const text = formatLoggedLocation({
      loggedAt: new Date("2024-06-15T10:30:00Z"),
      deviceTimestamp: new Date("2024-06-15T10:29:58.5Z"),
      longitude: 11.516667,
      latitude: 48.1173,
      altitude: 545.4,
    });

    expect(text.split("\n")).toEqual([
      "logged at: 2024-06-15T10:30:00.000Z",
      "device time: 2024-06-15T10:29:58.500Z",
      "x: 11.516667",
      "y: 48.117300",
      "z: 545.400000",
    ]);
  });

  it("should keep the sign of western and southern coordinates", () => {
    const text = formatLoggedLocation({
      loggedAt: new Date("2024-06-15T10:30:00Z"),
      deviceTimestamp: new Date("2024-06-15T10:30:00Z"),
      longitude: -151.21,
      latitude: -33.856667,
      altitude: 12,
    });

    expect(text).toContain("x: -151.210000\ny: -33.856667\nz: 12.000000");
  });
});
