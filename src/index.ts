import dotenv from "dotenv";
dotenv.config();

import { ServiceContainer } from "@di/ServiceContainer";
import { ConfigService } from "@services/config/ConfigService";
import { isFailure } from "@core/types";
import { SHUTDOWN_TIMEOUT_MS } from "@core/constants";
import { getLogger } from "@utils/logger";

const logger = getLogger("HotspotGPS");

/**
 * Main entry point
 *
 * 1. Loads configuration from the environment
 * 2. Starts the status page, the stream reader, the sampler and the flusher
 * 3. Sets up graceful shutdown
 */
async function main() {
  logger.info("🚀 Starting hotspot GPS logger...");

  const configResult = ConfigService.load(process.env);
  if (isFailure(configResult)) {
    logger.error(configResult.error.message);
    process.exit(1);
  }

  const container = new ServiceContainer(configResult.data);

  logger.info("Starting web interface...");
  const webService = container.getWebService();
  const webResult = await webService.start();
  if (isFailure(webResult)) {
    logger.error(`Failed to start web interface: ${webResult.error.message}`);
    process.exit(1);
  }

  const readerResult = container.getStreamReader().start();
  if (isFailure(readerResult)) {
    logger.error(readerResult.error.message);
    process.exit(1);
  }
  container.getLocationSampler().start();
  container.getQueueFlusher().start();

  logger.info("✅ Hotspot GPS logger is ready");
  logger.info(`   Status page: ${webService.getServerUrl()}`);

  setupGracefulShutdown(container);
}

/**
 * Setup handlers for graceful shutdown
 */
function setupGracefulShutdown(container: ServiceContainer): void {
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`${signal} received. Shutting down gracefully...`);

    const forceExitTimeout = setTimeout(() => {
      logger.warn("Shutdown timed out, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    try {
      container.getLocationSampler().stop();
      container.getQueueFlusher().stop();

      logger.info("Stopping stream reader...");
      await container.getStreamReader().stop();

      logger.info("Flushing outbound queue...");
      const flushResult = await container.getQueueFlusher().flush();
      if (isFailure(flushResult)) {
        logger.warn(
          `${container.getOutboundQueue().size()} record(s) were not persisted`,
        );
      }

      logger.info("Stopping web interface...");
      await container.getWebService().stop();

      await container.getLocationRepository().close();

      clearTimeout(forceExitTimeout);
      logger.info("✓ Shutdown complete");
      process.exit(0);
    } catch (error) {
      clearTimeout(forceExitTimeout);
      logger.error("Error during shutdown:", error);
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled rejection:", reason);
    void shutdown("UNHANDLED_REJECTION");
  });
}

main().catch((error) => {
  logger.error("Failed to start application:", error);
  process.exit(1);
});
