import dotenv from "dotenv";
dotenv.config();

import { ServiceContainer } from "@di/ServiceContainer";
import { IntegratedWebService } from "@web/IntegratedWebService";
import { isSuccess } from "@core/types";
import { IDeviceDirectory, IScreenScheduler } from "@core/interfaces";
import { isBaseError } from "@utils/typeGuards";
import { getLogger } from "@utils/logger";

const logger = getLogger("Inkstand");

/**
 * Main Entry Point for the Inkstand server
 *
 * 1. Reads configuration and creates the service container
 * 2. Picks the monochrome encoder and prepares the image directory
 * 3. Starts the device API
 * 4. Sets up graceful shutdown
 */
async function main() {
  logger.info("🚀 Starting Inkstand server...");

  try {
    const container = ServiceContainer.getInstance();
    const config = container.getServerConfig();

    logger.info("Selecting monochrome encoder...");
    await container.selectMonochromeEncoder();

    const storeResult = await container.getImageStore().initialize();
    if (!isSuccess(storeResult)) {
      logger.error("Failed to prepare image directory:", storeResult.error.getUserMessage());
      process.exit(1);
    }

    const directory = container.getDeviceDirectory();
    logger.info(`✓ Device database at ${config.storage.databasePath}`);

    const webService = container.getWebInterfaceService();
    const webResult = await webService.start();
    if (!isSuccess(webResult)) {
      logger.error("Failed to start device API:", webResult.error.getUserMessage());
      process.exit(1);
    }

    logger.info(`✅ Inkstand is ready at ${webService.getServerUrl()}`);
    logger.info(`   Devices poll ${config.web.apiBasePath}/display`);

    setupGracefulShutdown(webService, container.getScreenScheduler(), directory);
  } catch (error) {
    if (isBaseError(error)) {
      logger.error(`Fatal error during startup: ${error.message}`);
    } else {
      logger.error("Fatal error during startup:", error);
    }
    process.exit(1);
  }
}

/**
 * Setup handlers for graceful shutdown
 */
function setupGracefulShutdown(
  webService: IntegratedWebService,
  scheduler: IScreenScheduler,
  directory: IDeviceDirectory,
): void {
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`${signal} received. Shutting down gracefully...`);

    // Force exit after 5 seconds if graceful shutdown hangs
    const forceExitTimeout = setTimeout(() => {
      logger.warn("Shutdown timed out, forcing exit");
      process.exit(1);
    }, 5000);

    try {
      if (scheduler.isRunning()) {
        logger.info("Stopping scheduled screens...");
        scheduler.stop();
      }

      logger.info("Stopping device API...");
      const stopped = await webService.stop();
      if (!isSuccess(stopped)) {
        logger.warn(stopped.error.message);
      }

      logger.info("Closing device database...");
      directory.close();

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

  process.on("uncaughtException", (error) => {
    logger.error("Uncaught exception:", error);
    void shutdown("UNCAUGHT_EXCEPTION");
  });

  process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled rejection:", reason);
    void shutdown("UNHANDLED_REJECTION");
  });
}

// Start the application
main().catch((error) => {
  logger.error("Failed to start application:", error);
  process.exit(1);
});
