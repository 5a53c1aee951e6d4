import { Readable, pipeline } from "stream";
import { ReadlineParser } from "@serialport/parser-readline";
import { IDeviceConnector, IFixStore } from "@core/interfaces";
import {
  Result,
  StreamMetrics,
  StreamState,
  StreamStatus,
  failure,
  success,
} from "@core/types";
import { StreamError } from "@core/errors";
import { parseSentence } from "@services/nmea/NMEAParser";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";

const logger = getLogger("StreamReader");

export interface StreamReaderOptions {
  /** Pause between a failed session and the next connection attempt */
  reconnectDelayMs: number;
}

/**
 * Keeps a connection to the device open and feeds every decoded sentence
 * into the fix store.
 *
 * Each session connects, splits the body on `\n` and decodes line by
 * line. Lines that fail to decode are counted and skipped. When a session
 * ends, by a connect failure, a read failure or the device closing the
 * stream, the fix store is cleared once and the reader waits
 * `reconnectDelayMs` before connecting again. `stop()` interrupts both
 * the open session and the wait.
 */
export class StreamReader {
  private state: StreamState = StreamState.IDLE;
  private running = false;
  private loop: Promise<void> | null = null;
  private activeSource: Readable | null = null;
  private wakeCooldown: (() => void) | null = null;
  private readonly metrics: StreamMetrics = {
    linesReceived: 0,
    fragmentsDecoded: 0,
    decodeErrors: 0,
    sessions: 0,
    failures: 0,
  };

  constructor(
    private readonly store: IFixStore,
    private readonly connector: IDeviceConnector,
    private readonly options: StreamReaderOptions,
  ) {}

  start(): Result<void, StreamError> {
    if (this.running) {
      return failure(StreamError.alreadyRunning());
    }

    logger.info(`Starting GPS stream reader for ${this.connector.describe()}`);
    this.running = true;
    this.loop = this.run();
    return success(undefined);
  }

  /**
   * Stop reading and wait for the current session to wind down
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    logger.info("Stopping GPS stream reader");
    this.running = false;
    this.activeSource?.destroy();
    this.wakeCooldown?.();
    await this.loop;
    this.loop = null;
    logger.info("✓ GPS stream reader stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  getState(): StreamState {
    return this.state;
  }

  getMetrics(): StreamMetrics {
    return { ...this.metrics };
  }

  getStatus(): StreamStatus {
    return { state: this.state, metrics: this.getMetrics() };
  }

  private async run(): Promise<void> {
    while (this.running) {
      const error = await this.runSession();
      if (!this.running) {
        break;
      }

      this.metrics.failures++;
      this.metrics.lastError = error.message;
      logger.warn(`Error getting GPS: ${error.message}`);
      this.store.clear();

      this.state = StreamState.COOLDOWN;
      logger.info(
        `Reconnecting in ${Math.round(this.options.reconnectDelayMs / 1000)}s`,
      );
      await this.cooldown();
    }
    this.state = StreamState.STOPPED;
  }

  /**
   * One connect-and-read pass; resolves with the error that ended it
   */
  private async runSession(): Promise<StreamError> {
    this.state = StreamState.CONNECTING;

    let source: Readable;
    try {
      source = await this.connector.connect();
    } catch (error) {
      return error instanceof StreamError
        ? error
        : StreamError.connectFailed(this.connector.describe(), toError(error));
    }

    if (!this.running) {
      source.destroy();
      return StreamError.endOfStream();
    }

    this.activeSource = source;
    this.state = StreamState.STREAMING;
    this.metrics.sessions++;
    logger.info(`✓ Connected to GPS stream at ${this.connector.describe()}`);

    const lines = pipeline(
      source,
      new ReadlineParser({ delimiter: "\n" }),
      (error) => {
        if (error) {
          logger.debug(`Line pipeline closed: ${error.message}`);
        }
      },
    );

    try {
      for await (const chunk of lines) {
        this.handleLine(String(chunk));
      }
      return StreamError.endOfStream();
    } catch (error) {
      return error instanceof StreamError
        ? error
        : StreamError.readFailed(toError(error));
    } finally {
      this.activeSource = null;
      source.destroy();
    }
  }

  private handleLine(raw: string): void {
    const line = raw.replace(/^[\0\r]+|[\0\r]+$/g, "");
    if (line === "") {
      return;
    }

    this.metrics.linesReceived++;
    this.metrics.lastLineAt = new Date();

    const result = parseSentence(line);
    if (!result.success) {
      this.metrics.decodeErrors++;
      if (result.error.isUnsupportedType()) {
        logger.debug(`Skipping ${result.error.message}`);
      } else {
        logger.debug(`Failed to parse NMEA line: ${result.error.message}`);
      }
      return;
    }

    this.store.update(result.data);
    this.metrics.fragmentsDecoded++;
  }

  private cooldown(): Promise<void> {
    return new Promise<void>((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.wakeCooldown = null;
        resolve();
      };
      const timer = setTimeout(done, this.options.reconnectDelayMs);
      this.wakeCooldown = done;
    });
  }
}
