import dotenv from "dotenv";
dotenv.config();

import { LoggedLocation, isFailure } from "@core/types";
import { ConfigError } from "@core/errors";
import { LocationRepository } from "@services/storage/LocationRepository";
import { getLogger } from "@utils/logger";

const logger = getLogger("latest");

/**
 * Plain-text report of a logged location
 *
 * @example
 * logged at: 2024-06-15T10:30:00.000Z
 * device time: 2024-06-15T10:29:58.000Z
 * x: 11.516667
 * y: 48.117300
 * z: 545.400000
 */
export function formatLoggedLocation(location: LoggedLocation): string {
  return [
    `logged at: ${location.loggedAt.toISOString()}`,
    `device time: ${location.deviceTimestamp.toISOString()}`,
    `x: ${location.longitude.toFixed(6)}`,
    `y: ${location.latitude.toFixed(6)}`,
    `z: ${location.altitude.toFixed(6)}`,
  ].join("\n");
}

/**
 * Print the most recently logged location
 */
async function main(): Promise<number> {
  const connectionString = process.env.GPS_DB_CONNECTION_STRING?.trim();
  if (!connectionString) {
    logger.error(ConfigError.missingField("GPS_DB_CONNECTION_STRING").message);
    return 1;
  }

  const repository = LocationRepository.fromConnectionString(connectionString);
  try {
    const result = await repository.getLatest();
    if (isFailure(result)) {
      logger.error(result.error.message);
      return 1;
    }
    if (!result.data) {
      logger.info("No locations logged yet");
      return 0;
    }
    process.stdout.write(`${formatLoggedLocation(result.data)}\n`);
    return 0;
  } finally {
    await repository.close();
  }
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((error) => {
      logger.error("Failed to read latest location:", error);
      process.exit(1);
    });
}
