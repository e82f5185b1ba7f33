import type { IntensityAssignment, Region, RenderedImage, RenderOptions, SizeClass } from "./types.js";
import { resolveViewBounds } from "./bounds.js";
import { createProjectionContext } from "./projection.js";
import { composeScene } from "./scene.js";
import { buildRegionLabels } from "./labels.js";
import { rasterize } from "./raster.js";

export const BASE_WIDTH = 1280;
export const BASE_HEIGHT = 720;

const SIZE_MULTIPLIERS: Record<SizeClass, number> = {
  "1": 1, // 1280x720
  "2": 2, // 2560x1440
  "3": 4, // 5120x2880
};

export function multiplierFor(sizeClass: SizeClass = "1"): number {
  return SIZE_MULTIPLIERS[sizeClass];
}

export function canvasSize(multiplier: number): { width: number; height: number } {
  return { width: BASE_WIDTH * multiplier, height: BASE_HEIGHT * multiplier };
}

/**
 * Full pipeline: fit the view to the active regions, project and compose the
 * scene, then rasterize it with labels and footer. Same inputs, same bytes.
 */
export function render(
  regions: readonly Region[],
  intensities: IntensityAssignment,
  options: RenderOptions = {}
): RenderedImage {
  const multiplier = multiplierFor(options.sizeClass);
  const { width, height } = canvasSize(multiplier);

  const bounds = resolveViewBounds(regions, intensities);
  const projection = createProjectionContext(bounds, width, height);
  const scene = composeScene(regions, intensities, projection.project, width, height, { multiplier });
  const labels = options.showLabels ? buildRegionLabels(regions, intensities, projection.project) : [];

  const image = rasterize(scene, {
    multiplier,
    labels,
    footerText: options.footerText,
    font: options.font,
  });
  return { width: image.width, height: image.height, png: image.png };
}
