import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import type { Server } from "node:http";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { createDatasetLoader } from "prefecture-map-ingestion";
import { createApp, startServer } from "../src/app.js";
import type { ServerConfig } from "../src/config.js";
import { createLogger, type Logger } from "../src/logger.js";

const fixture = (path: string) => fileURLToPath(new URL(path, import.meta.url));
const datasetPath = fixture("../../ingestion/tests/fixtures/prefectures.geojson");
const brokenPath = fixture("../../ingestion/tests/fixtures/broken.geojson");
const fontFile = fixture("../../engine/tests/fixtures/Lato-Regular.ttf");

function testConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  return {
    port: 0,
    dataset: { path: datasetPath, cache: true },
    font: { family: "Lato", files: { 400: fontFile } },
    logLevel: "error",
    ...overrides,
  };
}

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

async function listen(
  config: ServerConfig,
  loadRegions = createDatasetLoader(config.dataset),
  logger: Logger = createLogger("test", "error")
) {
  const app = createApp(config, { loadRegions, logger });
  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("expected a TCP address");
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

function close(server: Server) {
  return new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

const scaleParam = (items: unknown) => encodeURIComponent(JSON.stringify(items));

describe("GET /map", () => {
  const loadRegions = vi.fn(createDatasetLoader({ path: datasetPath, cache: true }));
  const logger = silentLogger();
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    ({ server, baseUrl } = await listen(testConfig(), loadRegions, logger));
  });

  afterAll(async () => {
    await close(server);
    vi.restoreAllMocks();
  });

  it("renders a png for valid intensities", async () => {
    const res = await fetch(`${baseUrl}/map?scale=${scaleParam([{ id: 13, scale: 5 }])}&size=1`);
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("image/png");
    const body = Buffer.from(await res.arrayBuffer());
    expect(body.readUInt32BE(16)).toBe(1280);
    expect(body.readUInt32BE(20)).toBe(720);
  });

  it("logs each request as it arrives", async () => {
    const query = `scale=${scaleParam([{ id: 13, scale: 5 }])}`;
    vi.mocked(logger.debug).mockClear();
    await fetch(`${baseUrl}/map?${query}`);
    expect(logger.debug).toHaveBeenCalledWith(`Map request: /map?${query}`);
  });

  it("renders labels and a custom footer on request", async () => {
    const scale = scaleParam([{ id: 13, scale: 5 }]);
    const footer = encodeURIComponent("Source: test");
    const fetchPng = async (query: string) => {
      const res = await fetch(`${baseUrl}/map?${query}`);
      expect(res.status).toBe(200);
      return Buffer.from(await res.arrayBuffer());
    };
    const plain = await fetchPng(`scale=${scale}`);
    const labelled = await fetchPng(`scale=${scale}&scale_text=true`);
    const captioned = await fetchPng(`scale=${scale}&footer=${footer}`);
    expect(labelled.equals(plain)).toBe(false);
    expect(captioned.equals(plain)).toBe(false);
  });

  it("rejects a scale of 9 before loading any geometry", async () => {
    loadRegions.mockClear();
    const res = await fetch(`${baseUrl}/map?scale=${scaleParam([{ id: 13, scale: 9 }])}`);
    expect(res.status).toBe(400);
    expect(res.headers.get("content-type")).toContain("text/plain");
    expect(await res.text()).toBe("Invalid scale value for ID 13: 9");
    expect(loadRegions).not.toHaveBeenCalled();
  });

  it("requires the scale parameter", async () => {
    const res = await fetch(`${baseUrl}/map`);
    expect(res.status).toBe(400);
    expect(await res.text()).toBe("scale parameter is required");
  });

  it("rejects malformed scale data", async () => {
    const res = await fetch(`${baseUrl}/map?scale=${encodeURIComponent("[{")}`);
    expect(res.status).toBe(400);
    expect(await res.text()).toMatch(/^Invalid scale data format: /);
  });
});

describe("GET /map failures", () => {
  beforeAll(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterAll(() => {
    vi.restoreAllMocks();
  });

  it("answers 500 when the dataset cannot be read", async () => {
    const config = testConfig({ dataset: { path: "/nonexistent/japan.geojson", cache: false } });
    const { server, baseUrl } = await listen(config);
    try {
      const res = await fetch(`${baseUrl}/map?scale=${scaleParam([{ id: 13, scale: 5 }])}`);
      expect(res.status).toBe(500);
      expect(await res.text()).toMatch(
        /^Failed to load geometry dataset: Failed to read geometry dataset \/nonexistent\/japan\.geojson: /
      );
    } finally {
      await close(server);
    }
  });

  it("reports a malformed dataset once, with the parse error", async () => {
    let parseError = "";
    try {
      JSON.parse(readFileSync(brokenPath, "utf-8"));
    } catch (err) {
      if (err instanceof Error) parseError = err.message;
    }
    const config = testConfig({ dataset: { path: brokenPath, cache: false } });
    const { server, baseUrl } = await listen(config);
    try {
      const res = await fetch(`${baseUrl}/map?scale=${scaleParam([{ id: 13, scale: 5 }])}`);
      expect(res.status).toBe(500);
      expect(await res.text()).toBe(
        `Failed to load geometry dataset: Failed to parse geometry dataset ${brokenPath}: ${parseError}`
      );
    } finally {
      await close(server);
    }
  });

  it("answers 500 instead of dropping text when no font is configured", async () => {
    const { server, baseUrl } = await listen(testConfig({ font: {} }));
    try {
      const res = await fetch(`${baseUrl}/map?scale=${scaleParam([{ id: 13, scale: 5 }])}`);
      expect(res.status).toBe(500);
      expect(await res.text()).toBe(
        "Failed to render map: No font file configured and system fonts are disabled"
      );
    } finally {
      await close(server);
    }
  });

  it("answers 500 when the font cannot be loaded", async () => {
    const config = testConfig({ font: { files: { 400: "/nonexistent/fonts/roboto-regular.ttf" } } });
    const { server, baseUrl } = await listen(config);
    try {
      const res = await fetch(`${baseUrl}/map?scale=${scaleParam([{ id: 13, scale: 5 }])}`);
      expect(res.status).toBe(500);
      expect(await res.text()).toMatch(/^Failed to render map: Failed to load font \/nonexistent\/fonts\/roboto-regular\.ttf/);
    } finally {
      await close(server);
    }
  });
});

describe("GET /health", () => {
  it("reports ok", async () => {
    const { server, baseUrl } = await listen(testConfig());
    try {
      const res = await fetch(`${baseUrl}/health`);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: "ok" });
    } finally {
      await close(server);
    }
  });
});

describe("startServer", () => {
  it("rejects when the port is already taken", async () => {
    const app = createApp(testConfig(), { logger: silentLogger() });
    const first = await startServer(app, 0);
    const address = first.address();
    if (address === null || typeof address === "string") throw new Error("expected a TCP address");
    try {
      await expect(startServer(app, address.port)).rejects.toMatchObject({ code: "EADDRINUSE" });
    } finally {
      await close(first);
    }
  });
});
