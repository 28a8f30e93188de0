import dotenv from "dotenv";
dotenv.config();

import { ServiceContainer } from "@di/ServiceContainer";
import { isSuccess, StatusSnapshot, VpnStatus } from "@core/types";
import { IStatusOrchestrator } from "@core/interfaces";
import { extractErrorInfo } from "@utils/typeGuards";
import { getLogger } from "@utils/logger";

const logger = getLogger("Netpanel");

/**
 * Main Entry Point for the network panel service
 *
 * 1. Loads config.json
 * 2. Starts the polling scheduler
 * 3. Logs connectivity changes from published snapshots
 * 4. Sets up graceful shutdown
 */

/**
 * One line describing what the panel would show
 */
function describeSnapshot(snapshot: StatusSnapshot): string {
  const wifi = snapshot.features.wifi
    ? (snapshot.wifi.connectedSsid ?? "not connected")
    : "unavailable";
  let vpn: string = snapshot.vpn.status;
  if (
    snapshot.vpn.status === VpnStatus.CONNECTED ||
    snapshot.vpn.status === VpnStatus.CONNECTING
  ) {
    vpn += ` (${snapshot.vpn.profile?.displayName ?? "external"})`;
  }
  const location = snapshot.geolocation
    ? snapshot.geolocation.status === "ok"
      ? `${snapshot.geolocation.city ?? "?"}, ${snapshot.geolocation.country ?? "?"}`
      : "lookup failed"
    : "pending";
  return `Wi-Fi: ${wifi} | VPN: ${vpn} | Location: ${location} | AP clients: ${snapshot.system.connectedClients}`;
}

async function main() {
  logger.info("Starting network panel service...");

  try {
    const container = ServiceContainer.getInstance();

    const configResult = await container.getConfigService().initialize();
    if (!isSuccess(configResult)) {
      const { code, message } = extractErrorInfo(configResult.error);
      logger.warn(`${message} (${code})`);
    } else {
      logger.info("✓ Configuration loaded");
    }

    const orchestrator = container.getStatusOrchestrator();
    orchestrator.subscribe((snapshot, previous) => {
      const line = describeSnapshot(snapshot);
      if (previous === null || describeSnapshot(previous) !== line) {
        logger.info(line);
      }
    });

    await orchestrator.start();
    logger.info("✓ Scheduler started");

    setupGracefulShutdown(orchestrator);
  } catch (error) {
    logger.error("Fatal error during startup:", error);
    process.exit(1);
  }
}

/**
 * Setup handlers for graceful shutdown
 */
function setupGracefulShutdown(orchestrator: IStatusOrchestrator): void {
  const shutdown = async (signal: string) => {
    logger.info(`${signal} received. Shutting down gracefully...`);

    // Force exit after 5 seconds if graceful shutdown hangs
    const forceExitTimeout = setTimeout(() => {
      logger.warn("Shutdown timed out, forcing exit");
      process.exit(1);
    }, 5000);

    try {
      await orchestrator.stop();
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

main().catch((error) => {
  logger.error("Failed to start application:", error);
  process.exit(1);
});
