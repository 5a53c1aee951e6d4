import { PersistenceRecord, QueueStatus, Result, failure, success } from "@core/types";
import { QueueError } from "@core/errors";
import { QUEUE_DEFAULT_CAPACITY } from "@core/constants";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";

const logger = getLogger("OutboundQueue");

/**
 * Receives a batch in queue order and resolves once it is durably stored
 */
export type BatchWriter = (
  records: readonly PersistenceRecord[],
) => Promise<void>;

/**
 * Bounded FIFO of records waiting to be persisted.
 *
 * Beyond `capacity` the oldest records are dropped. Only one drain runs
 * at a time; records are removed only after the writer resolves, so a
 * failed write leaves the queue exactly as it was and records enqueued
 * while a write is in flight are kept for the next drain.
 */
export class OutboundQueue {
  private records: PersistenceRecord[] = [];
  private isDrainInProgress = false;
  private evictedTotal = 0;

  constructor(private readonly capacity: number = QUEUE_DEFAULT_CAPACITY) {}

  /**
   * Append a record, evicting the oldest ones beyond capacity
   *
   * @returns number of records evicted
   */
  enqueue(record: PersistenceRecord): number {
    this.records.push(record);

    const overflow = this.records.length - this.capacity;
    if (overflow <= 0) {
      return 0;
    }

    this.records.splice(0, overflow);
    this.evictedTotal += overflow;
    logger.warn(
      `Outbound queue full, dropped ${overflow} oldest record(s) (capacity ${this.capacity})`,
    );
    return overflow;
  }

  /**
   * Hand the queued records to `writer` and remove them once it resolves
   *
   * @returns number of records written
   */
  async drain(writer: BatchWriter): Promise<Result<number, QueueError>> {
    if (this.isDrainInProgress) {
      return failure(QueueError.drainInProgress());
    }
    if (this.records.length === 0) {
      return success(0);
    }

    this.isDrainInProgress = true;
    const batch = [...this.records];
    try {
      await writer(batch);
    } catch (error) {
      return failure(QueueError.writeFailed(batch.length, toError(error)));
    } finally {
      this.isDrainInProgress = false;
    }

    // Eviction may have dropped part of the batch while the write was in flight
    const written = new Set(batch);
    this.records = this.records.filter((record) => !written.has(record));
    return success(batch.length);
  }

  size(): number {
    return this.records.length;
  }

  /**
   * Copy of the queued records, oldest first
   */
  peek(): readonly PersistenceRecord[] {
    return [...this.records];
  }

  getStatus(): QueueStatus {
    return {
      size: this.records.length,
      capacity: this.capacity,
      draining: this.isDrainInProgress,
      evicted: this.evictedTotal,
    };
  }
}
