import type { FontConfig, FontWeight } from "prefecture-map-engine";
import type { LogLevel } from "./logger.js";

export interface ServerConfig {
  port: number;
  dataset: {
    path: string;
    objectName?: string;
    cache: boolean;
  };
  font: FontConfig;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function parsePort(raw: string | undefined): number {
  if (!raw) return 8080;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${raw}`);
  }
  return port;
}

function parseFontWeight(raw: string | undefined): FontWeight {
  if (raw === undefined || raw === "" || raw === "400") return 400;
  if (raw === "500") return 500;
  throw new Error(`Invalid MAP_FONT_WEIGHT: ${raw} (expected 400 or 500)`);
}

function parseLogLevel(raw: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === raw) ?? "info";
}

/** Server settings from environment variables; unset values take the defaults. */
export function loadServerConfig(env: Env = process.env): ServerConfig {
  return {
    port: parsePort(env.PORT),
    dataset: {
      path: env.MAP_DATASET_PATH || "japan.geojson",
      objectName: env.MAP_DATASET_OBJECT || undefined,
      cache: env.MAP_DATASET_CACHE !== "0",
    },
    font: {
      weight: parseFontWeight(env.MAP_FONT_WEIGHT),
      files: {
        400: env.MAP_FONT_REGULAR || "fonts/roboto-regular.ttf",
        500: env.MAP_FONT_MEDIUM || "fonts/roboto-medium.ttf",
      },
      family: env.MAP_FONT_FAMILY || "Roboto",
      loadSystemFonts: env.MAP_SYSTEM_FONTS === "1",
    },
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}
