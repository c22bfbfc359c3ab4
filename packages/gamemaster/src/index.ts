import dotenv from "dotenv";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { Simulator } from "./Simulator";

dotenv.config();

// ========== Setup ==========

const config = loadConfig();
const logger = createLogger("GM Server", config.logLevel);

const simulator = new Simulator({
  parallel: config.parallel,
  logger: logger.child("Simulator"),
});

const app = createApp(simulator, config, logger);

// ========== Start ==========

const server = app.listen(config.port, config.host, () => {
  logger.info(`Listening on ${config.host}:${config.port}`);
  if (config.parallel.enabled) {
    logger.info(
      `Parallel batches: up to ${config.parallel.maxWorkers} workers from ${config.parallel.minSimulations} matches`,
    );
  } else {
    logger.info("Parallel batches disabled; every batch runs in-process");
  }
  if (config.rateLimit.enabled) {
    logger.info(`Rate limit: ${config.rateLimit.requests} requests per ${config.rateLimit.windowSeconds}s per client`);
  }
});

function shutdown(signal: string): void {
  logger.info(`${signal} received, closing server`);
  server.close(err => {
    if (err) {
      logger.error("Error while closing server:", err);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

export { app, server, simulator };
