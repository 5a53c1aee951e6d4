import {
  formatDMS,
  formatDegreesMinutes,
  hemisphere,
  mapEmbedUrl,
  mapLink,
} from "../geo";

describe("geo utilities", () => {
  describe("hemisphere", () => {
    it("should name the latitude hemisphere", () => {
      expect(hemisphere(48.1173, "latitude")).toBe("N");
      expect(hemisphere(-33.85, "latitude")).toBe("S");
    });

    it("should name the longitude hemisphere", () => {
      expect(hemisphere(11.5, "longitude")).toBe("E");
      expect(hemisphere(-0.1, "longitude")).toBe("W");
    });
  });

  describe("formatDegreesMinutes", () => {
    it("should print degrees followed by minutes with four decimals", () => {
      expect(formatDegreesMinutes(48.1173)).toBe("4807.0380");
    });

    it("should pad minutes below ten and drop the sign", () => {
      expect(formatDegreesMinutes(-11.1)).toBe("1106.0000");
    });

    it("should print zero degrees", () => {
      expect(formatDegreesMinutes(0.5)).toBe("030.0000");
    });

    it("should carry minutes that round up to ten", () => {
      expect(formatDegreesMinutes(48 + 9.99999996 / 60)).toBe("4810.0000");
    });

    it("should carry minutes that round up to sixty into the degrees", () => {
      expect(formatDegreesMinutes(48 + 59.99999996 / 60)).toBe("4900.0000");
    });
  });

  describe("formatDMS", () => {
    it("should print degrees, minutes and seconds", () => {
      expect(formatDMS(48.1173)).toBe(`48° 7' 2.280000"`);
    });

    it("should drop the sign", () => {
      expect(formatDMS(-0.5)).toBe(`0° 30' 0.000000"`);
    });

    it("should carry seconds that round up to sixty into the minutes", () => {
      expect(formatDMS(48 + 7 / 60 + 59.9999999 / 3600)).toBe(
        `48° 8' 0.000000"`,
      );
    });

    it("should carry a full minute of seconds into the degrees", () => {
      expect(formatDMS(48 + 59 / 60 + 59.9999999 / 3600)).toBe(
        `49° 0' 0.000000"`,
      );
    });
  });

  describe("mapLink", () => {
    it("should link to the position with six decimals", () => {
      expect(mapLink(48.1173, 11.516667)).toBe(
        "https://www.google.com/maps?q=48.117300,11.516667",
      );
    });
  });

  describe("mapEmbedUrl", () => {
    it("should include the encoded key and the position", () => {
      expect(mapEmbedUrl("test key", -33.85, 151.21)).toBe(
        "https://www.google.com/maps/embed/v1/place?key=test%20key&q=-33.850000,151.210000",
      );
    });
  });
});
