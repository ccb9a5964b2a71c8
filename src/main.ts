#!/usr/bin/env node
import { loadConfig, validateConfig } from "./infrastructure/config/Config.js";
import { PinoLogger } from "./infrastructure/logging/PinoLogger.js";
import { WebSocketConnection } from "./infrastructure/websocket/WebSocketConnection.js";
import { ReconnectController } from "./application/ReconnectController.js";
import { createLoggingHooks } from "./application/LoggingHooks.js";
import { HealthServer } from "./presentation/HealthServer.js";

/**
 * Keeps the configured WebSocket link up until SIGINT/SIGTERM or until
 * the retry thresholds are exhausted.
 */
async function main(): Promise<number> {
  const config = loadConfig();
  validateConfig(config);

  const logger = new PinoLogger({
    name: config.link.name,
    level: config.logging.level,
    pretty: config.logging.pretty,
  });

  logger.info("Link starting", {
    name: config.link.name,
    url: config.link.url,
    maxConnectAttempts: config.reconnection.maxConnectAttempts,
    maxConnectionErrors: config.reconnection.maxConnectionErrors,
  });

  const connection = new WebSocketConnection(
    {
      url: config.link.url,
      pingInterval: config.link.pingInterval,
      closeTimeout: config.link.closeTimeout,
    },
    logger.child({ component: "WebSocketConnection" })
  );

  const controller = new ReconnectController(connection, logger, {
    maxConnectAttempts: config.reconnection.maxConnectAttempts,
    maxConnectionErrors: config.reconnection.maxConnectionErrors,
    ...createLoggingHooks(logger.child({ component: "Link" })),
  });

  let healthServer: HealthServer | null = null;
  if (config.health.port > 0) {
    healthServer = new HealthServer(controller, logger.child({ component: "HealthServer" }), {
      port: config.health.port,
    });
    await healthServer.start();
  }

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    controller.close().catch((error) => {
      logger.error("Error while closing link", error);
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  let exitCode = 0;
  try {
    await controller.start();
    logger.info("Link closed");
  } catch (error) {
    logger.fatal("Link failed", error);
    exitCode = 1;
  } finally {
    await healthServer?.stop();
  }
  return exitCode;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("Unhandled error:", error);
    process.exit(1);
  });
