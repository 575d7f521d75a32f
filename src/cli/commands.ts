/**
 * CLI commands for the development toolbox
 */

import chalk from "chalk";
import { resolveToolboxConfig, type CliOptions } from "../server/config.js";
import { startToolboxServer, type RunningToolboxServer } from "../server/server.js";
import { initializeLogger, logError, logInfo, toLoggable } from "../utils/logger.js";

/**
 * Run the toolbox server until SIGINT/SIGTERM or an unhandled failure.
 */
export async function runServer(options: CliOptions): Promise<void> {
  initializeLogger(options.debug);

  try {
    const config = resolveToolboxConfig(options);

    console.error(chalk.cyan("\n🧰 Development Toolbox MCP"));
    console.error(chalk.cyan("==========================\n"));
    logInfo(`Starting server with ${config.transport.toUpperCase()} transport...`, { component: "CLI" });

    const server = await startToolboxServer({ config });
    installShutdownHandlers(server);
  } catch (error) {
    logError("Failed to start toolbox server", toLoggable(error));
    process.exit(1);
  }
}

function installShutdownHandlers(server: RunningToolboxServer): void {
  const shutdown = (code: number) => {
    server.close()
      .catch((err: unknown) => logError("Error during shutdown", toLoggable(err)))
      .finally(() => process.exit(code));
  };

  process.once("SIGINT", () => shutdown(0));
  process.once("SIGTERM", () => shutdown(0));
  process.once("uncaughtException", (error) => {
    logError("Uncaught exception", error);
    shutdown(1);
  });
  process.once("unhandledRejection", (reason) => {
    logError("Unhandled promise rejection", toLoggable(reason));
    shutdown(1);
  });
}
