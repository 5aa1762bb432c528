#!/usr/bin/env node
import { loadConfig, toGatewayConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { RpcGateway } from "./gateway/index.js";
import { createLogger } from "./logger.js";
import { ConfigError } from "./sdk/errors.js";

const USAGE = "Usage: slotguard <PORT> <URL1> <URL2> ...  (or set PORT and UPSTREAMS)";

function readConfig(): AppConfig {
  try {
    return loadConfig(process.argv.slice(2), process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      console.error(USAGE);
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  const logger = createLogger({ level: config.logLevel });
  const gateway = new RpcGateway(toGatewayConfig(config, logger));
  await gateway.start();

  for (const route of gateway.getStatus()) {
    logger.info({ endpoints: route.endpoints.length }, `Route ${route.routeId}`);
    for (const endpoint of route.endpoints) {
      logger.info({ state: endpoint.state }, `  - ${endpoint.url}`);
    }
  }
  logger.info(
    {
      lagTolerance: config.options.lagTolerance,
      lagThreshold: config.options.lagThreshold,
      probeIntervalMs: config.options.probeIntervalMs,
    },
    "Quarantine settings",
  );

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    gateway
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, "Shutdown failed");
        process.exit(1);
      });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((error) => {
  console.error("Failed to start gateway:", error);
  process.exit(1);
});
