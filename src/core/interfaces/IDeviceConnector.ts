import { Readable } from "stream";

/**
 * Opens the telemetry stream of the device.
 */
export interface IDeviceConnector {
  /**
   * Connect, send the request and resolve with the response body.
   * Rejects when the connection cannot be established.
   */
  connect(): Promise<Readable>;

  /**
   * Human-readable endpoint for log messages
   */
  describe(): string;
}
