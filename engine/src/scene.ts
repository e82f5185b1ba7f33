import type { IntensityAssignment, ProjectionFn, Region, SceneElement, VectorScene } from "./types.js";
import { BACKGROUND_COLOR, colorOf, regionStyle } from "./style.js";
import { buildPaths } from "./path.js";

export interface ComposeSceneOptions {
  multiplier?: number;
}

/**
 * Build the vector scene: every region in dataset order, inactive ones at the
 * level-0 colour. All rings of a region share one element and one style.
 */
export function composeScene(
  regions: readonly Region[],
  intensities: IntensityAssignment,
  project: ProjectionFn,
  width: number,
  height: number,
  options: ComposeSceneOptions = {}
): VectorScene {
  const multiplier = options.multiplier ?? 1;
  const elements: SceneElement[] = regions.map((region) => {
    const level = intensities.get(region.id) ?? 0;
    return {
      path: buildPaths(region.geometry, project).join(" "),
      style: regionStyle(colorOf(level), multiplier),
    };
  });
  return Object.freeze({
    width,
    height,
    background: BACKGROUND_COLOR,
    elements: Object.freeze(elements),
  });
}
