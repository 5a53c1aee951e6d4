/**
 * Coordinate formatting for display and map links.
 */

export type CoordinateAxis = "latitude" | "longitude";

/**
 * Hemisphere letter for a signed coordinate
 */
export function hemisphere(value: number, axis: CoordinateAxis): string {
  if (axis === "latitude") {
    return value < 0 ? "S" : "N";
  }
  return value < 0 ? "W" : "E";
}

/**
 * Format decimal degrees in the NMEA degrees-and-minutes notation
 * (DDMM.MMMM), without sign.
 *
 * @example
 * formatDegreesMinutes(48.1173); // "4807.0380"
 */
export function formatDegreesMinutes(value: number): string {
  // ten-thousandths of a minute, rounded before splitting so 59.99999' carries
  const units = Math.round(Math.abs(value) * 60 * 10_000);
  const degrees = Math.floor(units / 600_000);
  const minutes = (units - degrees * 600_000) / 10_000;
  const padding = minutes < 10 ? "0" : "";
  return `${degrees}${padding}${minutes.toFixed(4)}`;
}

/**
 * Format decimal degrees as degrees, minutes and seconds, without sign.
 *
 * @example
 * formatDMS(48.1173); // 48° 7' 2.280000"
 */
export function formatDMS(value: number): string {
  const microseconds = Math.round(Math.abs(value) * 3600 * 1_000_000);
  const degrees = Math.floor(microseconds / 3_600_000_000);
  const rest = microseconds - degrees * 3_600_000_000;
  const minutes = Math.floor(rest / 60_000_000);
  const seconds = (rest - minutes * 60_000_000) / 1_000_000;
  return `${degrees}° ${minutes}' ${seconds.toFixed(6)}"`;
}

/**
 * Public map link for a position
 */
export function mapLink(latitude: number, longitude: number): string {
  return `https://www.google.com/maps?q=${latitude.toFixed(6)},${longitude.toFixed(6)}`;
}

/**
 * Embeddable map URL for a position, requires a Maps Embed API key
 */
export function mapEmbedUrl(
  apiKey: string,
  latitude: number,
  longitude: number,
): string {
  return `https://www.google.com/maps/embed/v1/place?key=${encodeURIComponent(apiKey)}&q=${latitude.toFixed(6)},${longitude.toFixed(6)}`;
}
