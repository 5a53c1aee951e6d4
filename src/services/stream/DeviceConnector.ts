import net from "net";
import { Readable, pipeline } from "stream";
import { IDeviceConnector } from "@core/interfaces";
import { DeviceConfig } from "@core/types";
import { StreamError } from "@core/errors";
import { getLogger } from "@utils/logger";
import { Http09ResponseShim, HttpHeadParser } from "./Http09Transport";

const logger = getLogger("DeviceConnector");

/**
 * Plain TCP connection to the hotspot's telemetry port.
 *
 * Sends a single GET request line and resolves with the response body,
 * after the first-read shim and the head parser. No timeouts are applied
 * to the socket.
 */
export class DeviceConnector implements IDeviceConnector {
  constructor(
    private readonly config: Pick<DeviceConfig, "host" | "port" | "path">,
  ) {}

  describe(): string {
    return `http://${this.config.host}:${this.config.port}${this.config.path}`;
  }

  connect(): Promise<Readable> {
    const { host, port } = this.config;

    return new Promise<Readable>((resolve, reject) => {
      const socket = net.createConnection({ host, port });

      const onError = (error: Error) => {
        socket.destroy();
        reject(StreamError.connectFailed(this.describe(), error));
      };
      socket.once("error", onError);

      socket.once("connect", () => {
        socket.off("error", onError);
        socket.setKeepAlive(true);
        logger.debug(`TCP connection to ${host}:${port} established`);

        const body = pipeline(
          socket,
          new Http09ResponseShim(),
          new HttpHeadParser(),
          (error) => {
            if (error) {
              logger.debug(`Device pipeline closed: ${error.message}`);
            }
          },
        );
        socket.write(this.buildRequest());
        resolve(body);
      });
    });
  }

  private buildRequest(): string {
    const { host, port, path } = this.config;
    return [
      `GET ${path} HTTP/1.1`,
      `Host: ${host}:${port}`,
      "User-Agent: hotspot-gps-logger",
      "Accept: */*",
      "",
      "",
    ].join("\r\n");
  }
}
