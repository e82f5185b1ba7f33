import { readFile } from "node:fs/promises";
import { feature } from "topojson-client";
import type { Topology } from "topojson-specification";
import {
  DatasetError,
  GeometryShapeError,
  type Position,
  type Region,
  type RegionGeometry,
  type RegionID,
} from "prefecture-map-engine";
import { isFiniteNumber, isRecord } from "./guards.js";

export interface DatasetOptions {
  /** TopoJSON object to decode; defaults to the first one. */
  objectName?: string;
}

export interface DatasetLoaderOptions extends DatasetOptions {
  path: string;
  cache?: boolean;
}

export type DatasetLoader = () => Promise<readonly Region[]>;

function isTopology(value: unknown): value is Topology {
  return isRecord(value) && value.type === "Topology" && isRecord(value.objects) && Array.isArray(value.arcs);
}

function topologyFeatures(topology: Topology, objectName?: string): unknown[] {
  const name = objectName ?? Object.keys(topology.objects)[0];
  const object = name === undefined ? undefined : topology.objects[name];
  if (!object) {
    throw new DatasetError(`TopoJSON object ${name ?? "(none)"} not found in dataset`);
  }
  const decoded = feature(topology, object);
  return decoded.type === "FeatureCollection" ? decoded.features : [decoded];
}

function parsePosition(value: unknown, where: string): Position {
  if (!Array.isArray(value) || value.length < 2) {
    throw new GeometryShapeError(`${where}: position must be a [lon, lat] pair`);
  }
  const lon: unknown = value[0];
  const lat: unknown = value[1];
  if (!isFiniteNumber(lon) || !isFiniteNumber(lat)) {
    throw new GeometryShapeError(`${where}: position must hold finite numbers`);
  }
  return [lon, lat];
}

function parseRing(value: unknown, where: string): Position[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new GeometryShapeError(`${where}: ring must be a non-empty array of positions`);
  }
  return value.map((position: unknown, i) => parsePosition(position, `${where}[${i}]`));
}

function parsePolygon(value: unknown, where: string): Position[][] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new GeometryShapeError(`${where}: polygon needs at least one ring`);
  }
  return value.map((ring: unknown, i) => parseRing(ring, `${where}[${i}]`));
}

function parseGeometry(value: unknown, id: RegionID): RegionGeometry {
  const where = `Region ${id}`;
  if (!isRecord(value)) {
    throw new GeometryShapeError(`${where} has no geometry`);
  }
  switch (value.type) {
    case "Polygon":
      return { type: "Polygon", coordinates: parsePolygon(value.coordinates, where) };
    case "MultiPolygon": {
      const polygons = value.coordinates;
      if (!Array.isArray(polygons) || polygons.length === 0) {
        throw new GeometryShapeError(`${where}: multi-polygon needs at least one polygon`);
      }
      return {
        type: "MultiPolygon",
        coordinates: polygons.map((polygon: unknown, i) => parsePolygon(polygon, `${where}[${i}]`)),
      };
    }
    default:
      throw new GeometryShapeError(`${where} has unsupported geometry type ${String(value.type)}`);
  }
}

/** `properties.id` first; a numeric feature-level id (TopoJSON keeps it there) otherwise. */
function parseRegionId(value: Record<string, unknown>, index: number): RegionID {
  const props: Record<string, unknown> = isRecord(value.properties) ? value.properties : {};
  const candidates: unknown[] = [props.id, value.id];
  for (const candidate of candidates) {
    if (isFiniteNumber(candidate) && Number.isInteger(candidate)) return candidate;
    if (typeof candidate === "string" && /^\d+$/.test(candidate)) return Number(candidate);
  }
  throw new GeometryShapeError(`Invalid ID format in feature ${index}`);
}

function parseFeature(value: unknown, index: number): Region {
  if (!isRecord(value) || value.type !== "Feature") {
    throw new GeometryShapeError(`Feature ${index} is not a GeoJSON Feature`);
  }
  const id = parseRegionId(value, index);
  return { id, geometry: parseGeometry(value.geometry, id) };
}

/**
 * Decode a GeoJSON FeatureCollection or a TopoJSON Topology into regions, in
 * source order.
 */
export function parseDataset(source: unknown, options: DatasetOptions = {}): Region[] {
  let features: unknown[];
  if (isTopology(source)) {
    features = topologyFeatures(source, options.objectName);
  } else if (isRecord(source) && source.type === "FeatureCollection" && Array.isArray(source.features)) {
    features = source.features;
  } else {
    throw new DatasetError("Geometry dataset must be a GeoJSON FeatureCollection or a TopoJSON Topology");
  }
  if (features.length === 0) {
    throw new DatasetError("Geometry dataset contains no regions");
  }
  return features.map((f, i) => parseFeature(f, i));
}

export async function loadDataset(path: string, options: DatasetOptions = {}): Promise<Region[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new DatasetError(`Failed to read geometry dataset ${path}`, { cause: err });
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new DatasetError(`Failed to parse geometry dataset ${path}`, { cause: err });
  }
  return parseDataset(json, options);
}

function freezeRegions(regions: Region[]): readonly Region[] {
  const freeze = (value: unknown): void => {
    if (typeof value !== "object" || value === null || Object.isFrozen(value)) return;
    Object.freeze(value);
    for (const child of Object.values(value)) freeze(child);
  };
  freeze(regions);
  return regions;
}

/**
 * Loader for the request path. With `cache` the parsed regions are frozen and
 * shared by every request; a failed load is dropped so the next call reads
 * the file again.
 */
export function createDatasetLoader(options: DatasetLoaderOptions): DatasetLoader {
  const { path, cache = false, ...datasetOptions } = options;
  let cached: Promise<readonly Region[]> | undefined;

  return () => {
    if (!cache) return loadDataset(path, datasetOptions);
    if (!cached) {
      cached = loadDataset(path, datasetOptions).then(freezeRegions, (err: unknown) => {
        cached = undefined;
        throw err;
      });
    }
    return cached;
  };
}
