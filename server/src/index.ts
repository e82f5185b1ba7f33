import { describeError } from "prefecture-map-engine";
import { createApp, loadServerConfig, startServer } from "./app.js";
import { createLogger } from "./logger.js";

const config = loadServerConfig();
const logger = createLogger("map", config.logLevel);
const app = createApp(config, { logger });

try {
  await startServer(app, config.port);
} catch (err) {
  logger.error(`Failed to listen on port ${config.port}:`, describeError(err));
  process.exit(1);
}

logger.info("========================================");
logger.info(`Map server listening on port ${config.port}`);
logger.info("========================================");
logger.info(`Dataset: ${config.dataset.path}${config.dataset.cache ? " (cached)" : ""}`);
logger.info(`Map endpoint: http://localhost:${config.port}/map?scale=[{"id":13,"scale":5}]`);
