/**
 * Decoded NMEA 0183 sentence variants kept by the fix store.
 *
 * Every fragment is a plain readonly value tagged by `kind`. Numeric fields
 * that the receiver left empty decode as 0; date and time fields that were
 * empty decode as "".
 */

/**
 * GGA fix quality indicators
 */
export enum GPSFixQuality {
  NO_FIX = 0,
  GPS_FIX = 1,
  DGPS_FIX = 2,
  PPS_FIX = 3,
  RTK_FIX = 4,
  FLOAT_RTK = 5,
  ESTIMATED = 6,
  MANUAL = 7,
  SIMULATION = 8,
}

/**
 * RMC - Recommended Minimum Specific GNSS Data (position/velocity)
 */
export type RMCFragment = {
  readonly kind: "RMC";
  /** Talker id, e.g. "GP" or "GN" */
  readonly talker: string;
  /** UTC time as HH:MM:SS.mmm */
  readonly time: string;
  /** A=Active, V=Void */
  readonly validity: "A" | "V";
  /** Latitude in decimal degrees */
  readonly latitude: number;
  /** Longitude in decimal degrees */
  readonly longitude: number;
  /** Speed over ground in knots */
  readonly speed: number;
  /** Course over ground in degrees (true north) */
  readonly course: number;
  /** UTC date as DD/MM/YY */
  readonly date: string;
  /** Magnetic variation in degrees, negative when west */
  readonly variation: number;
};

/**
 * GGA - Global Positioning System Fix Data (altitude fix)
 */
export type GGAFragment = {
  readonly kind: "GGA";
  readonly talker: string;
  readonly time: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly fixQuality: GPSFixQuality;
  readonly satellitesInUse: number;
  readonly hdop: number;
  /** Altitude above mean sea level in meters */
  readonly altitude: number;
  /** Geoidal separation in meters */
  readonly separation: number;
};

/**
 * GSA - GNSS DOP and Active Satellites (satellite geometry)
 */
export type GSAFragment = {
  readonly kind: "GSA";
  readonly talker: string;
  /** A=Automatic, M=Manual */
  readonly mode: string;
  /** 1=no fix, 2=2D, 3=3D */
  readonly fixType: number;
  readonly satelliteIds: readonly number[];
  readonly pdop: number;
  readonly hdop: number;
  readonly vdop: number;
};

/**
 * One satellite entry of a GSV sentence
 */
export type SatelliteInView = {
  readonly prn: number;
  /** Elevation in degrees */
  readonly elevation: number;
  /** Azimuth in degrees */
  readonly azimuth: number;
  /** Signal-to-noise ratio in dB-Hz */
  readonly snr: number;
};

/**
 * GSV - GNSS Satellites in View
 */
export type GSVFragment = {
  readonly kind: "GSV";
  readonly talker: string;
  readonly totalMessages: number;
  readonly messageNumber: number;
  readonly satellitesInView: number;
  readonly satellites: readonly SatelliteInView[];
};

/**
 * VTG - Track Made Good and Ground Speed
 */
export type VTGFragment = {
  readonly kind: "VTG";
  readonly talker: string;
  readonly trueTrack: number;
  readonly magneticTrack: number;
  readonly speedKnots: number;
  readonly speedKph: number;
};

export type FixFragment =
  | RMCFragment
  | GGAFragment
  | GSAFragment
  | GSVFragment
  | VTGFragment;

export type FixKind = FixFragment["kind"];

/**
 * Consistent copy of the fix store taken at a single point in time
 */
export type FixSnapshot = Readonly<{
  rmc: RMCFragment | null;
  gga: GGAFragment | null;
  gsa: GSAFragment | null;
  gsv: GSVFragment | null;
  vtg: VTGFragment | null;
  /** When any slot was last written, null while the store is empty */
  updatedAt: Date | null;
}>;
