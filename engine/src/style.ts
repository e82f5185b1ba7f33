import type { HexColor, IntensityLevel } from "./types.js";

/** Fill colour per intensity level, index = level. */
export const INTENSITY_PALETTE: readonly HexColor[] = [
  "#27272a", // 0: inactive
  "#bae6fd",
  "#4ade80",
  "#facc15",
  "#f97316",
  "#dc2626",
  "#86198f",
  "#500724",
];

export const BACKGROUND_COLOR: HexColor = "#18181b";
export const STROKE_COLOR: HexColor = "#a1a1aa";
export const TEXT_COLOR: HexColor = "#fafafa";
export const FILL_OPACITY = 0.8;
export const BASE_STROKE_WIDTH = 0.4;

const OUT_OF_RANGE_DARKEST: HexColor = "#4a044e";
const OUT_OF_RANGE_SECOND: HexColor = "#b91c1c";

/**
 * Resolve the fill colour for a level. Levels outside 0–7 are rejected before
 * rendering; the tiers below only apply if one slips through.
 */
export function colorOf(level: IntensityLevel): HexColor {
  if (Number.isInteger(level) && level >= 0 && level < INTENSITY_PALETTE.length) {
    return INTENSITY_PALETTE[level];
  }
  if (level > 6) return OUT_OF_RANGE_DARKEST;
  if (level > 5) return OUT_OF_RANGE_SECOND;
  return INTENSITY_PALETTE[0];
}

/** Per-region style string: fill, fixed stroke, scaled stroke width, fixed opacity. */
export function regionStyle(fill: HexColor, multiplier: number): string {
  const strokeWidth = (BASE_STROKE_WIDTH * multiplier).toFixed(1);
  return `fill:${fill};stroke:${STROKE_COLOR};stroke-width:${strokeWidth};fill-opacity:${FILL_OPACITY};fill-rule:evenodd`;
}
