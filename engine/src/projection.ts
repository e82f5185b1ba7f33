import type { ProjectionContext, ProjectionFn, ProjectionOptions, ViewBounds } from "./types.js";

export const DEFAULT_MARGIN = 0.1;
export const DEFAULT_MIN_SPAN = 1e-6;

/**
 * Fit `bounds` into a width × height canvas. Longitude distances are scaled by
 * cos(centre latitude), a local flat-earth correction that holds for a narrow
 * latitude band. One uniform scale is used for both axes (the smaller of the
 * two candidates), so one axis may keep more than the configured margin.
 */
export function createProjectionContext(
  bounds: ViewBounds,
  width: number,
  height: number,
  options: ProjectionOptions = {}
): ProjectionContext {
  const margin = options.margin ?? DEFAULT_MARGIN;
  const minSpan = options.minSpan ?? DEFAULT_MIN_SPAN;

  const effectiveWidth = width * (1 - 2 * margin);
  const effectiveHeight = height * (1 - 2 * margin);

  const centerLon = (bounds.maxLon + bounds.minLon) / 2;
  const centerLat = (bounds.maxLat + bounds.minLat) / 2;
  const centerX = width / 2;
  const centerY = height / 2;

  const lonCorrection = Math.cos((centerLat * Math.PI) / 180);
  const lonSpan = Math.max((bounds.maxLon - bounds.minLon) * lonCorrection, minSpan);
  const latSpan = Math.max(bounds.maxLat - bounds.minLat, minSpan);

  const scale = Math.min(effectiveWidth / lonSpan, effectiveHeight / latSpan);

  // pixel y grows downward, hence centerLat - lat
  const project: ProjectionFn = ([lon, lat]) => [
    (lon - centerLon) * lonCorrection * scale + centerX,
    (centerLat - lat) * scale + centerY,
  ];

  return Object.freeze({
    width,
    height,
    margin,
    scale,
    lonCorrection,
    centerGeo: Object.freeze([centerLon, centerLat] as const),
    centerPixel: Object.freeze([centerX, centerY] as const),
    project,
  });
}

export function makeProjector(
  bounds: ViewBounds,
  width: number,
  height: number,
  margin: number = DEFAULT_MARGIN
): ProjectionFn {
  return createProjectionContext(bounds, width, height, { margin }).project;
}
