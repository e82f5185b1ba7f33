import { accessSync, constants } from "node:fs";
import { Resvg, type RenderedImage as ResvgImage, type ResvgRenderOptions } from "@resvg/resvg-js";
import type { FontConfig, FontWeight, RasterizeOptions, TextLabel, VectorScene } from "./types.js";
import { RenderingError } from "./errors.js";
import { footerLabel } from "./labels.js";
import { escapeXml, sceneToSvg, type TextOverlay } from "./svg.js";
import { TEXT_COLOR } from "./style.js";

export const DEFAULT_FONT_FAMILY = "Roboto";
export const BASE_FONT_SIZE = 14;

export interface RasterImage {
  width: number;
  height: number;
  png: Buffer;
  /** RGBA, row-major, width * height * 4 bytes. */
  pixels: Buffer;
}

export interface ResolvedFont {
  weight: FontWeight;
  family: string;
  file?: string;
  loadSystemFonts: boolean;
}

const SAMPLE_TEXT = "0123456789";
const usableFonts = new Set<string>();

function renderOptions(font: ResolvedFont): ResvgRenderOptions {
  return {
    fitTo: { mode: "original" },
    font: {
      loadSystemFonts: font.loadSystemFonts,
      fontFiles: font.file ? [font.file] : [],
      defaultFontFamily: font.family,
    },
    logLevel: "off",
  };
}

// resvg silently drops <text> it has no face for; a usable face gives the
// sample string a non-empty box.
function drawsText(font: ResolvedFont): boolean {
  const svg =
    `<svg xmlns="http://www.w3.org/2000/svg" width="200" height="40">` +
    `<text x="0" y="30" font-family="${escapeXml(font.family)}" font-size="${BASE_FONT_SIZE}" ` +
    `font-weight="${font.weight}">${SAMPLE_TEXT}</text></svg>`;
  const bbox = new Resvg(svg, renderOptions(font)).getBBox();
  return bbox !== undefined && bbox.width > 0 && bbox.height > 0;
}

/**
 * Pick the file for the requested weight, falling back to the regular face,
 * and make sure the renderer can draw text with it.
 */
export function resolveFont(config: FontConfig = {}): ResolvedFont {
  const weight = config.weight ?? 400;
  const file = config.files?.[weight] ?? config.files?.[400];
  const font: ResolvedFont = {
    weight,
    family: config.family ?? DEFAULT_FONT_FAMILY,
    file,
    loadSystemFonts: config.loadSystemFonts ?? false,
  };
  if (file === undefined && !font.loadSystemFonts) {
    throw new RenderingError("font", "No font file configured and system fonts are disabled");
  }
  if (file !== undefined) {
    try {
      accessSync(file, constants.R_OK);
    } catch (err) {
      throw new RenderingError("font", `Failed to load font ${file}`, { cause: err });
    }
  }

  const key = JSON.stringify(font);
  if (usableFonts.has(key)) return font;
  let usable: boolean;
  try {
    usable = drawsText(font);
  } catch (err) {
    throw new RenderingError("font", `Failed to load font ${file ?? font.family}`, { cause: err });
  }
  if (!usable) {
    const source = file ?? "system fonts";
    throw new RenderingError("font", `No usable ${font.family} face in ${source}`);
  }
  usableFonts.add(key);
  return font;
}

/**
 * Rasterize the scene at its own pixel size, draw the level labels and the
 * footer caption over it, and encode the result as PNG.
 */
export function rasterize(scene: VectorScene, options: RasterizeOptions): RasterImage {
  const font = resolveFont(options.font);
  const texts: TextLabel[] = [
    ...(options.labels ?? []),
    footerLabel(scene.height, options.multiplier, options.footerText),
  ];
  const overlay: TextOverlay = {
    labels: texts,
    fontSize: BASE_FONT_SIZE * options.multiplier,
    fontFamily: font.family,
    fontWeight: font.weight,
    color: TEXT_COLOR,
  };
  const svg = sceneToSvg(scene, overlay);

  let rendered: ResvgImage;
  try {
    rendered = new Resvg(svg, renderOptions(font)).render();
  } catch (err) {
    throw new RenderingError("rasterize", "Failed to rasterize vector scene", { cause: err });
  }

  let png: Buffer;
  try {
    png = rendered.asPng();
  } catch (err) {
    throw new RenderingError("encode", "Failed to encode png", { cause: err });
  }

  return { width: rendered.width, height: rendered.height, png, pixels: rendered.pixels };
}
