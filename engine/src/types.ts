import type { MultiPolygon, Polygon, Position } from "geojson";

export type RegionID = number;
export type IntensityLevel = number; // 0–7 once validated
export type HexColor = string;

export type { Position };
export type RegionGeometry = Polygon | MultiPolygon;

export interface Region {
  id: RegionID;
  geometry: RegionGeometry;
}

/** Region id → level. Ids that are absent render at level 0. */
export type IntensityAssignment = ReadonlyMap<RegionID, IntensityLevel>;

export interface IntensityQuery {
  id: RegionID;
  scale: number;
}

export interface ViewBounds {
  minLon: number;
  minLat: number;
  maxLon: number;
  maxLat: number;
}

export type ProjectionFn = (coords: [number, number]) => [number, number];

export interface ProjectionOptions {
  margin?: number; // fraction of the canvas kept empty on each side
  minSpan?: number; // floor for the corrected spans, in degrees
}

export interface ProjectionContext {
  readonly width: number;
  readonly height: number;
  readonly margin: number;
  readonly scale: number;
  readonly lonCorrection: number;
  readonly centerGeo: readonly [number, number]; // [lon, lat]
  readonly centerPixel: readonly [number, number]; // [x, y]
  readonly project: ProjectionFn;
}

export interface SceneElement {
  path: string;
  style: string;
}

export interface VectorScene {
  readonly width: number;
  readonly height: number;
  readonly background: HexColor;
  readonly elements: readonly SceneElement[];
}

export interface TextLabel {
  x: number;
  y: number;
  text: string;
}

export type FontWeight = 400 | 500;

export interface FontConfig {
  weight?: FontWeight;
  files?: Partial<Record<FontWeight, string>>;
  family?: string;
  loadSystemFonts?: boolean;
}

export type SizeClass = "1" | "2" | "3";

export interface RenderOptions {
  sizeClass?: SizeClass;
  footerText?: string;
  showLabels?: boolean;
  font?: FontConfig;
}

export interface RasterizeOptions {
  multiplier: number;
  labels?: TextLabel[];
  footerText?: string;
  font?: FontConfig;
}

export interface RenderedImage {
  width: number;
  height: number;
  png: Buffer;
}
