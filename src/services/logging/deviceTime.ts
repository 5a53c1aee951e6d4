const DEVICE_TIMESTAMP =
  /^(\d{2})\/(\d{2})\/(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?$/;

/**
 * Parse the receiver's `DD/MM/YYTHH:MM:SS[.fraction]` timestamp as UTC.
 *
 * Two-digit years 69-99 map to 1969-1999 and 00-68 to 2000-2068.
 * Fractions beyond milliseconds are truncated. Returns null for anything
 * that is not a real calendar date and time.
 */
export function parseDeviceTimestamp(value: string): Date | null {
  const match = DEVICE_TIMESTAMP.exec(value);
  if (!match) {
    return null;
  }

  const [, dd, mm, yy, hh, min, ss, fraction] = match;
  const day = Number(dd);
  const month = Number(mm);
  const shortYear = Number(yy);
  const year = shortYear >= 69 ? 1900 + shortYear : 2000 + shortYear;
  const hours = Number(hh);
  const minutes = Number(min);
  const seconds = Number(ss);
  const millis = fraction ? Number(fraction.padEnd(3, "0").slice(0, 3)) : 0;

  const date = new Date(
    Date.UTC(year, month - 1, day, hours, minutes, seconds, millis),
  );

  // Date.UTC rolls overflowing fields into the next unit
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hours ||
    date.getUTCMinutes() !== minutes ||
    date.getUTCSeconds() !== seconds
  ) {
    return null;
  }

  return date;
}
