/**
 * Prefecture Map Engine
 * ---------------------
 * Stateless pipeline from per-region intensity levels to a rendered PNG map.
 */
export type * from "./types.js";
export {
  MapRenderError,
  InputValidationError,
  DatasetError,
  GeometryShapeError,
  RenderingError,
  isClientError,
  describeError,
} from "./errors.js";
export type { MapErrorKind, RenderStage } from "./errors.js";

export {
  INTENSITY_PALETTE,
  BACKGROUND_COLOR,
  STROKE_COLOR,
  TEXT_COLOR,
  colorOf,
  regionStyle,
} from "./style.js";

export { polygonsOf, ringsOf, iterateCoordinates, ringCentroid, regionCentroid } from "./geometry.js";

export { computeBounds, datasetBounds, isDegenerateBounds, resolveViewBounds } from "./bounds.js";

export { createProjectionContext, makeProjector, DEFAULT_MARGIN, DEFAULT_MIN_SPAN } from "./projection.js";

export { buildRingPath, buildPaths } from "./path.js";

export { composeScene } from "./scene.js";

export { sceneToSvg, escapeXml } from "./svg.js";

export { buildRegionLabels, footerLabel, DEFAULT_FOOTER_TEXT } from "./labels.js";

export { rasterize, resolveFont } from "./raster.js";
export type { RasterImage, ResolvedFont } from "./raster.js";

export { render, multiplierFor, canvasSize, BASE_WIDTH, BASE_HEIGHT } from "./render.js";
