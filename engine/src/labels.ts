import type { IntensityAssignment, ProjectionFn, Region, TextLabel } from "./types.js";
import { regionCentroid } from "./geometry.js";

export const LABEL_OFFSET: readonly [number, number] = [-5, 5];
export const DEFAULT_FOOTER_TEXT = "Code available under the MIT License (GitHub: evacuate).";

/** Level labels for active regions, placed just off each projected centroid. */
export function buildRegionLabels(
  regions: readonly Region[],
  intensities: IntensityAssignment,
  project: ProjectionFn
): TextLabel[] {
  const labels: TextLabel[] = [];
  for (const region of regions) {
    const level = intensities.get(region.id) ?? 0;
    if (level === 0) continue;
    const [x, y] = project(regionCentroid(region.geometry));
    labels.push({
      x: Math.trunc(x) + LABEL_OFFSET[0],
      y: Math.trunc(y) + LABEL_OFFSET[1],
      text: String(level),
    });
  }
  return labels;
}

/** Caption anchored near the bottom-left corner; empty text falls back to the attribution. */
export function footerLabel(height: number, multiplier: number, text?: string): TextLabel {
  return {
    x: Math.trunc(10 * multiplier),
    y: height - Math.trunc(14 * multiplier),
    text: text ? text : DEFAULT_FOOTER_TEXT,
  };
}
