import { Request, Response } from "express";
import { IFixStore } from "@core/interfaces";
import { QueueStatus, StreamStatus } from "@core/types";
import { WebError } from "@core/errors";
import { StatusPageRenderer } from "@services/status/StatusPageRenderer";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";

const logger = getLogger("StatusController");

/**
 * Live state the status endpoints read from
 */
export interface StatusSources {
  store: Pick<IFixStore, "snapshot">;
  stream: { getStatus(): StreamStatus };
  queue: { getStatus(): QueueStatus };
}

/**
 * Status Controller
 *
 * Serves the current fix as an HTML page and as JSON.
 */
export class StatusController {
  constructor(
    private readonly sources: StatusSources,
    private readonly renderer: StatusPageRenderer,
  ) {}

  /**
   * Render the status page
   */
  getStatusPage(_req: Request, res: Response): void {
    let html: string;
    try {
      html = this.renderer.render(this.sources.store.snapshot());
    } catch (error) {
      const webError = WebError.renderFailed(toError(error));
      logger.error(webError.message);
      res.status(500).type("text/plain").send("Internal Server Error");
      return;
    }
    res.type("html").send(html);
  }

  /**
   * Current snapshot with stream and queue status
   */
  getFix(_req: Request, res: Response): void {
    logger.debug("Fix requested");
    res.json({
      success: true,
      data: {
        snapshot: this.sources.store.snapshot(),
        stream: this.sources.stream.getStatus(),
        queue: this.sources.queue.getStatus(),
      },
    });
  }
}
