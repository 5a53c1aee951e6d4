/**
 * A sampled 3D position waiting to be written to the gps_logs table.
 * Created by the sampler, never modified afterwards.
 */
export type PersistenceRecord = Readonly<{
  /** Wall-clock time the sample was taken */
  loggedAt: Date;
  /** Date and time reported by the receiver in the RMC sentence */
  deviceTimestamp: Date;
  longitude: number;
  latitude: number;
  /** Altitude in meters, from GGA */
  altitude: number;
  /** Speed over ground in knots */
  speed: number;
  /** Course over ground in degrees */
  course: number;
}>;

/**
 * Most recent row of the gps_logs table
 */
export type LoggedLocation = {
  loggedAt: Date;
  deviceTimestamp: Date;
  longitude: number;
  latitude: number;
  altitude: number;
};

export type QueueStatus = {
  size: number;
  capacity: number;
  draining: boolean;
  evicted: number;
};
