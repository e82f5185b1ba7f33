import type { Server } from "node:http";
import express, { type Express } from "express";
import { createDatasetLoader, type DatasetLoader } from "prefecture-map-ingestion";
import type { ServerConfig } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import { createMapRouter } from "./routes/map.js";

export interface AppDeps {
  loadRegions?: DatasetLoader;
  logger?: Logger;
}

export function createApp(config: ServerConfig, deps: AppDeps = {}): Express {
  const logger = deps.logger ?? createLogger("map", config.logLevel);
  const loadRegions =
    deps.loadRegions ??
    createDatasetLoader({
      path: config.dataset.path,
      objectName: config.dataset.objectName,
      cache: config.dataset.cache,
    });

  const app = express();
  app.disable("x-powered-by");

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });
  app.use(createMapRouter({ loadRegions, font: config.font, logger }));

  return app;
}

/** Listen on `port`; rejects instead of emitting `error` when the port cannot be bound. */
export function startServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      server.off("error", reject);
      resolve(server);
    });
    server.once("error", reject);
  });
}

export { loadServerConfig, type ServerConfig } from "./config.js";
export { createLogger, type Logger, type LogLevel } from "./logger.js";
