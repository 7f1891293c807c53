import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApp } from "~/index";
import { ConfigError, describeConfig, loadConfig } from "~/lib/config";
import { buildServices } from "~/lib/services";
import { TIMEOUTS } from "~/utils/constants";
import { logger } from "~/utils/logger";

function main() {
  const config = loadConfig();
  logger.configure({
    level: config.logLevel,
    pretty: config.nodeEnv === "development",
  });
  logger.info("Configuration loaded", describeConfig(config));

  const app = createApp(buildServices(config));

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info("Server listening", { port: info.port });
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info("Shutting down", { signal });

    const deadline = setTimeout(() => {
      logger.error("Graceful shutdown timed out; closing open connections");
      if ("closeAllConnections" in server) {
        server.closeAllConnections();
      }
      process.exit(1);
    }, TIMEOUTS.SHUTDOWN);
    deadline.unref();

    server.close((error) => {
      if (error) {
        logger.error("Graceful shutdown failed", error);
        process.exitCode = 1;
      } else {
        logger.info("Server stopped");
      }
      clearTimeout(deadline);
    });
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

try {
  main();
} catch (error) {
  if (error instanceof ConfigError) {
    logger.error("Invalid configuration", undefined, { issues: error.issues });
  } else {
    logger.error("Failed to start server", error);
  }
  process.exitCode = 1;
}
