import type { IntensityAssignment, Region, ViewBounds } from "./types.js";
import { iterateCoordinates } from "./geometry.js";
import { DatasetError } from "./errors.js";

/** Starting value for a scan: every min at its maximum, every max at its minimum. */
export function emptyBounds(): ViewBounds {
  return { minLon: 180, minLat: 90, maxLon: -180, maxLat: -90 };
}

function extendBounds(bounds: ViewBounds, region: Region): void {
  for (const [lon, lat] of iterateCoordinates(region.geometry)) {
    if (lon < bounds.minLon) bounds.minLon = lon;
    if (lat < bounds.minLat) bounds.minLat = lat;
    if (lon > bounds.maxLon) bounds.maxLon = lon;
    if (lat > bounds.maxLat) bounds.maxLat = lat;
  }
}

/**
 * Bounds covering only regions with a non-zero level. Inactive regions are
 * still drawn but never widen the view. With no active region the result is
 * inverted (min > max); see `isDegenerateBounds`.
 */
export function computeBounds(regions: readonly Region[], intensities: IntensityAssignment): ViewBounds {
  const bounds = emptyBounds();
  for (const region of regions) {
    if ((intensities.get(region.id) ?? 0) === 0) continue;
    extendBounds(bounds, region);
  }
  return bounds;
}

/** Bounds over every region, whatever its level. */
export function datasetBounds(regions: readonly Region[]): ViewBounds {
  const bounds = emptyBounds();
  for (const region of regions) extendBounds(bounds, region);
  return bounds;
}

export function isDegenerateBounds(bounds: ViewBounds): boolean {
  return bounds.minLon > bounds.maxLon || bounds.minLat > bounds.maxLat;
}

/** Active-region bounds, or the whole dataset when nothing is active. */
export function resolveViewBounds(regions: readonly Region[], intensities: IntensityAssignment): ViewBounds {
  const active = computeBounds(regions, intensities);
  if (!isDegenerateBounds(active)) return active;
  const whole = datasetBounds(regions);
  if (isDegenerateBounds(whole)) {
    throw new DatasetError("Geometry dataset has no coordinates to fit the view to");
  }
  return whole;
}
