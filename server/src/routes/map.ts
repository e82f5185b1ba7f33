import { Router, type Request, type Response } from "express";
import {
  MapRenderError,
  describeError,
  isClientError,
  render,
  type FontConfig,
} from "prefecture-map-engine";
import { parseRenderQuery, type DatasetLoader, type RenderRequest } from "prefecture-map-ingestion";
import type { Logger } from "../logger.js";

export interface MapRouteDeps {
  loadRegions: DatasetLoader;
  font: FontConfig;
  logger: Logger;
}

function failureMessage(error: unknown): string {
  const detail = describeError(error);
  if (!(error instanceof MapRenderError)) return `Failed to render map: ${detail}`;
  switch (error.kind) {
    case "dataset":
      return `Failed to load geometry dataset: ${detail}`;
    case "geometry":
      return `Invalid geometry dataset: ${detail}`;
    default:
      return `Failed to render map: ${detail}`;
  }
}

function sendError(res: Response, status: number, message: string) {
  res.status(status).type("text/plain").send(message);
}

// GET /map?scale=[{"id":13,"scale":5}]&size=1|2|3&footer=...&scale_text=true
// Returns: image/png
export function createMapRouter(deps: MapRouteDeps): Router {
  const router = Router();
  const { logger } = deps;

  async function handleMap(req: Request, res: Response): Promise<void> {
    const started = Date.now();
    logger.debug(`Map request: ${req.originalUrl}`);

    let request: RenderRequest;
    try {
      request = parseRenderQuery(req.query);
    } catch (error) {
      if (!isClientError(error)) throw error;
      logger.info(`Rejected request: ${error.message}`);
      sendError(res, 400, error.message);
      return;
    }

    try {
      const regions = await deps.loadRegions();
      const image = render(regions, request.intensities, { ...request.options, font: deps.font });
      logger.debug(
        `Rendered ${image.width}x${image.height} (${request.intensities.size} levels) in ${Date.now() - started}ms`
      );
      res.status(200).type("image/png").send(image.png);
    } catch (error) {
      const kind = error instanceof MapRenderError ? error.kind : "unknown";
      logger.error(`Render failed (${kind}):`, describeError(error));
      sendError(res, 500, failureMessage(error));
    }
  }

  router.get("/map", (req, res, next) => {
    handleMap(req, res).catch(next);
  });

  return router;
}
