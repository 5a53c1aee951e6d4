import { Result } from "@core/types";
import { WebError } from "@core/errors";

/**
 * Web Interface Service Interface
 *
 * Serves the status page and its JSON counterpart.
 */
export interface IWebInterfaceService {
  /**
   * Start listening on the configured host and port
   */
  start(): Promise<Result<void, WebError>>;

  /**
   * Stop the web server
   */
  stop(): Promise<Result<void, WebError>>;

  isRunning(): boolean;

  /**
   * Get the server URL (e.g., "http://0.0.0.0:8080")
   */
  getServerUrl(): string;
}
