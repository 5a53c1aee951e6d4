import { Pool, PoolClient } from "pg";
import { ILocationRepository } from "@core/interfaces";
import {
  LoggedLocation,
  PersistenceRecord,
  Result,
  failure,
  success,
} from "@core/types";
import { StorageError } from "@core/errors";
import { STORAGE_SRID } from "@core/constants";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";

const logger = getLogger("LocationRepository");

const INSERT_LOCATION = `INSERT INTO gps_logs(logged_at, gps_timestamp, gps_geometry, gps_speed, gps_course)
VALUES($1, $2, ST_GeographyFromText($3), $4, $5)`;

const SELECT_LATEST = `SELECT logged_at, gps_timestamp,
  ST_X(gps_geometry::geometry) AS longitude,
  ST_Y(gps_geometry::geometry) AS latitude,
  ST_Z(gps_geometry::geometry) AS altitude
FROM gps_logs
ORDER BY logged_at DESC
LIMIT 1`;

type LatestRow = {
  logged_at: Date;
  gps_timestamp: Date;
  longitude: number;
  latitude: number;
  altitude: number;
};

/**
 * EWKT for a 3D point, six decimals per ordinate
 *
 * @example
 * toEWKT({ longitude: 11.516667, latitude: 48.1173, altitude: 545.4, ... })
 * // "SRID=4326;POINTZ(11.516667 48.117300 545.400000)"
 */
export function toEWKT(
  record: Pick<PersistenceRecord, "longitude" | "latitude" | "altitude">,
): string {
  const ordinates = [record.longitude, record.latitude, record.altitude]
    .map((value) => value.toFixed(6))
    .join(" ");
  return `SRID=${STORAGE_SRID};POINTZ(${ordinates})`;
}

/**
 * gps_logs table on PostgreSQL/PostGIS
 *
 * A client whose ROLLBACK fails is released with that error, so the pool
 * destroys it instead of handing it out again.
 */
export class LocationRepository implements ILocationRepository {
  constructor(private readonly pool: Pool) {
    this.pool.on("error", (error) => {
      logger.warn(`Idle database client error: ${error.message}`);
    });
  }

  static fromConnectionString(connectionString: string): LocationRepository {
    return new LocationRepository(new Pool({ connectionString }));
  }

  async insertBatch(
    records: readonly PersistenceRecord[],
  ): Promise<Result<number, StorageError>> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      return failure(StorageError.transactionFailed(toError(error)));
    }

    let releaseError: Error | undefined;
    try {
      try {
        await client.query("BEGIN");
      } catch (error) {
        return failure(StorageError.transactionFailed(toError(error)));
      }

      for (const [index, record] of records.entries()) {
        try {
          await client.query(INSERT_LOCATION, [
            record.loggedAt,
            record.deviceTimestamp,
            toEWKT(record),
            record.speed,
            record.course,
          ]);
        } catch (error) {
          releaseError = await this.rollback(client);
          return failure(StorageError.insertFailed(index, toError(error)));
        }
      }

      try {
        await client.query("COMMIT");
      } catch (error) {
        releaseError = await this.rollback(client);
        return failure(StorageError.commitFailed(toError(error)));
      }

      logger.debug(`Committed ${records.length} location(s)`);
      return success(records.length);
    } finally {
      client.release(releaseError);
    }
  }

  async getLatest(): Promise<Result<LoggedLocation | null, StorageError>> {
    try {
      const { rows } = await this.pool.query<LatestRow>(SELECT_LATEST);
      const row = rows[0];
      if (!row) {
        return success(null);
      }
      return success({
        loggedAt: row.logged_at,
        deviceTimestamp: row.gps_timestamp,
        longitude: row.longitude,
        latitude: row.latitude,
        altitude: row.altitude,
      });
    } catch (error) {
      return failure(StorageError.queryFailed(toError(error)));
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async rollback(client: PoolClient): Promise<Error | undefined> {
    try {
      await client.query("ROLLBACK");
      return undefined;
    } catch (error) {
      const rollbackError = toError(error);
      logger.warn(`Rollback failed: ${rollbackError.message}`);
      return rollbackError;
    }
  }
}
