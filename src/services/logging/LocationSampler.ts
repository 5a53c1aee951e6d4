import { IFixStore, IScheduledTask } from "@core/interfaces";
import { PersistenceRecord, Result, failure, success } from "@core/types";
import { SamplingError } from "@core/errors";
import { getLogger } from "@utils/logger";
import { OutboundQueue } from "./OutboundQueue";
import { parseDeviceTimestamp } from "./deviceTime";

const logger = getLogger("LocationSampler");

export interface LocationSamplerOptions {
  initialDelayMs: number;
  intervalMs: number;
}

/**
 * Periodically turns the current fix into a persistence record.
 *
 * Position, speed and course come from RMC, altitude from GGA. A cycle
 * without both fragments, or with an unparseable RMC date and time, is
 * skipped.
 */
export class LocationSampler implements IScheduledTask {
  private initialTimer: NodeJS.Timeout | null = null;
  private intervalTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly store: IFixStore,
    private readonly queue: OutboundQueue,
    private readonly options: LocationSamplerOptions,
  ) {}

  sample(now: Date = new Date()): Result<PersistenceRecord, SamplingError> {
    const { rmc, gga } = this.store.snapshot();
    if (!rmc || !gga) {
      const missing = [rmc ? null : "RMC", gga ? null : "GGA"].filter(
        (kind): kind is string => kind !== null,
      );
      return failure(SamplingError.noDataToLog(missing));
    }

    const stamp = `${rmc.date}T${rmc.time}`;
    const deviceTimestamp = parseDeviceTimestamp(stamp);
    if (!deviceTimestamp) {
      return failure(SamplingError.invalidDeviceTimestamp(stamp));
    }

    const record: PersistenceRecord = Object.freeze({
      loggedAt: new Date(now.getTime()),
      deviceTimestamp,
      longitude: rmc.longitude,
      latitude: rmc.latitude,
      altitude: gga.altitude,
      speed: rmc.speed,
      course: rmc.course,
    });

    this.queue.enqueue(record);
    logger.info(
      `Queued location ${record.latitude.toFixed(6)},${record.longitude.toFixed(6)} (${this.queue.size()} pending)`,
    );
    return success(record);
  }

  start(): void {
    if (this.isRunning()) {
      return;
    }

    logger.info(
      `Sampling every ${this.options.intervalMs}ms after ${this.options.initialDelayMs}ms`,
    );
    this.initialTimer = setTimeout(() => {
      this.initialTimer = null;
      this.runCycle();
      this.intervalTimer = setInterval(
        () => this.runCycle(),
        this.options.intervalMs,
      );
    }, this.options.initialDelayMs);
  }

  stop(): void {
    if (this.initialTimer) {
      clearTimeout(this.initialTimer);
      this.initialTimer = null;
    }
    if (this.intervalTimer) {
      clearInterval(this.intervalTimer);
      this.intervalTimer = null;
    }
  }

  isRunning(): boolean {
    return this.initialTimer !== null || this.intervalTimer !== null;
  }

  private runCycle(): void {
    const result = this.sample(new Date());
    if (result.success) {
      return;
    }
    if (result.error.isNoData()) {
      logger.info(result.error.message);
    } else {
      logger.warn(result.error.message);
    }
  }
}
