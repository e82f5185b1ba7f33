import type { IntensityAssignment, RenderOptions, SizeClass } from "prefecture-map-engine";
import { buildIntensityAssignment, parseIntensityPayload } from "./intensity.js";
import { firstString } from "./guards.js";

export interface RenderRequest {
  intensities: IntensityAssignment;
  options: RenderOptions;
}

const SIZE_CLASSES: readonly SizeClass[] = ["1", "2", "3"];

/** Unknown or missing size classes render at base size. */
export function parseSizeClass(raw: string | undefined): SizeClass {
  return SIZE_CLASSES.find((size) => size === raw) ?? "1";
}

/**
 * Read `scale`, `size`, `footer` and `scale_text` from a query object. Input
 * errors are raised here, before anything is rendered.
 */
export function parseRenderQuery(query: Record<string, unknown>): RenderRequest {
  const intensities = buildIntensityAssignment(parseIntensityPayload(firstString(query.scale)));
  const footerText = firstString(query.footer);
  return {
    intensities,
    options: {
      sizeClass: parseSizeClass(firstString(query.size)),
      footerText: footerText ? footerText : undefined,
      showLabels: firstString(query.scale_text) === "true",
    },
  };
}
