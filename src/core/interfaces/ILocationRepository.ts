import { LoggedLocation, PersistenceRecord, Result } from "@core/types";
import { StorageError } from "@core/errors";

/**
 * Durable storage of sampled locations
 */
export interface ILocationRepository {
  /**
   * Insert every record in order inside one transaction.
   * Nothing is committed unless all inserts succeed.
   */
  insertBatch(
    records: readonly PersistenceRecord[],
  ): Promise<Result<number, StorageError>>;

  /**
   * Most recently logged location, null when the table is empty
   */
  getLatest(): Promise<Result<LoggedLocation | null, StorageError>>;

  /**
   * Release pooled connections
   */
  close(): Promise<void>;
}
