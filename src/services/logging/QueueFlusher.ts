import { ILocationRepository, IScheduledTask } from "@core/interfaces";
import { Result, failure, success } from "@core/types";
import { QueueError } from "@core/errors";
import { getLogger } from "@utils/logger";
import { OutboundQueue } from "./OutboundQueue";

const logger = getLogger("QueueFlusher");

/**
 * Moves queued records into the repository, one transaction per flush.
 * Runs once on start and then every `intervalMs`.
 *
 * Flushes run one after another: a flush requested while another is
 * writing starts once that write has settled.
 */
export class QueueFlusher implements IScheduledTask {
  private timer: NodeJS.Timeout | null = null;
  private lastFlush: Promise<unknown> = Promise.resolve();
  private flushCount = 0;

  constructor(
    private readonly queue: OutboundQueue,
    private readonly repository: ILocationRepository,
    private readonly intervalMs: number,
  ) {}

  flush(): Promise<Result<number, QueueError>> {
    const run = () => this.flushNow();
    const next = this.lastFlush.then(run, run);
    this.lastFlush = next;
    return next;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => void this.flush(), this.intervalMs);
    void this.flush();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  private async flushNow(): Promise<Result<number, QueueError>> {
    if (this.queue.size() === 0) {
      logger.debug("Nothing to flush");
      return success(0);
    }

    const timerLabel = `flush #${++this.flushCount}`;
    logger.time(timerLabel);
    const result = await this.queue.drain(async (records) => {
      const inserted = await this.repository.insertBatch(records);
      if (!inserted.success) {
        throw inserted.error;
      }
    });
    logger.timeEnd(timerLabel);

    if (!result.success) {
      logger.error(result.error.message);
      return failure(result.error);
    }

    logger.info(`✓ Flushed ${result.data} record(s) to database`);
    return result;
  }
}
