import express, { Express, NextFunction, Request, Response } from "express";
import http from "http";
import { Result, WebConfig, failure, success } from "@core/types";
import { IWebInterfaceService } from "@core/interfaces";
import { WebError } from "@core/errors";
import { getLogger } from "@utils/logger";
import { isNodeJSErrnoException, toError } from "@utils/typeGuards";
import { StatusController } from "./controllers/StatusController";

const logger = getLogger("StatusWebService");

/**
 * Status Web Service
 *
 * Express app serving the status page on `/` and the fix as JSON on
 * `/api/fix`.
 */
export class StatusWebService implements IWebInterfaceService {
  private readonly app: Express;
  private server: http.Server | null = null;

  constructor(
    private readonly config: Pick<WebConfig, "host" | "port">,
    private readonly controller: StatusController,
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  async start(): Promise<Result<void, WebError>> {
    if (this.server) {
      return success(undefined);
    }

    const server = http.createServer(this.app);
    try {
      await new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(this.config.port, this.config.host, () => {
          server.off("error", reject);
          resolve();
        });
      });
    } catch (error) {
      if (isNodeJSErrnoException(error) && error.code === "EADDRINUSE") {
        return failure(WebError.portInUse(this.config.port));
      }
      return failure(
        WebError.serverStartFailed(this.config.port, toError(error)),
      );
    }

    this.server = server;
    logger.info(`✓ Web server started on ${this.getServerUrl()}`);
    return success(undefined);
  }

  async stop(): Promise<Result<void, WebError>> {
    const server = this.server;
    if (!server) {
      return failure(WebError.serverNotRunning());
    }

    try {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      });
    } catch (error) {
      return failure(WebError.serverStopFailed(toError(error)));
    }

    this.server = null;
    logger.info("Web server stopped");
    return success(undefined);
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  /**
   * Server URL, with the bound port once listening (e.g., "http://localhost:8080")
   */
  getServerUrl(): string {
    const host =
      this.config.host === "0.0.0.0" ? "localhost" : this.config.host;
    return `http://${host}:${this.getPort()}`;
  }

  getPort(): number {
    const address = this.server?.address();
    if (address && typeof address === "object") {
      return address.port;
    }
    return this.config.port;
  }

  private setupMiddleware(): void {
    this.app.disable("x-powered-by");
    this.app.use((req, _res, next) => {
      logger.debug(`${req.method} ${req.path}`);
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get("/", (req, res) => this.controller.getStatusPage(req, res));
    this.app.get("/api/fix", (req, res) => this.controller.getFix(req, res));

    this.app.use((req, res) => {
      res.status(404).json({
        success: false,
        error: { code: "NOT_FOUND", message: `Cannot ${req.method} ${req.path}` },
      });
    });

    this.app.use(
      (err: Error, _req: Request, res: Response, _next: NextFunction) => {
        logger.error(`Express error: ${err.message}`);
        res.status(500).json({
          success: false,
          error: { code: "INTERNAL_ERROR", message: "Internal Server Error" },
        });
      },
    );
  }
}
