/**
 * Ledger watch entry point
 *
 * Starts the watcher and wires graceful shutdown on SIGINT/SIGTERM.
 */

import { startApplication, type ApplicationHandle } from "./services/startup";
import { serviceLoggers } from "./utils/logger";

const log = serviceLoggers.startup;

function setupGracefulShutdown(app: ApplicationHandle): void {
  const shutdown = async (signal: string): Promise<void> => {
    log.info(`Received ${signal}, shutting down...`);
    try {
      await app.stop();
      process.exit(0);
    } catch (error) {
      log.error("Error during shutdown", { error: error instanceof Error ? error.message : String(error) });
      process.exit(1);
    }
  };

  process.once("SIGTERM", () => void shutdown("SIGTERM"));
  process.once("SIGINT", () => void shutdown("SIGINT"));
}

async function main(): Promise<void> {
  const app = await startApplication();
  setupGracefulShutdown(app);
}

main().catch((error: unknown) => {
  log.fatal("Failed to start", { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
