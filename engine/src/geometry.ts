import type { Position, RegionGeometry } from "./types.js";
import { GeometryShapeError } from "./errors.js";

/** Polygons of a geometry, with a Polygon treated as a one-member MultiPolygon. */
export function polygonsOf(geometry: RegionGeometry): Position[][][] {
  switch (geometry.type) {
    case "Polygon":
      return [geometry.coordinates];
    case "MultiPolygon":
      return geometry.coordinates;
  }
}

/** Every ring of every polygon, in source order. */
export function ringsOf(geometry: RegionGeometry): Position[][] {
  return polygonsOf(geometry).flat();
}

/**
 * Helper iterator over all coordinates in a region geometry.
 */
export function* iterateCoordinates(geometry: RegionGeometry): Generator<[number, number]> {
  for (const ring of ringsOf(geometry)) {
    for (const coord of ring) {
      yield [coord[0], coord[1]];
    }
  }
}

/** Unweighted mean of a ring's vertices. The closing vertex counts like any other. */
export function ringCentroid(ring: Position[]): [number, number] {
  if (ring.length === 0) {
    throw new GeometryShapeError("Cannot take the centroid of an empty ring");
  }
  let sumLon = 0;
  let sumLat = 0;
  for (const coord of ring) {
    sumLon += coord[0];
    sumLat += coord[1];
  }
  return [sumLon / ring.length, sumLat / ring.length];
}

/**
 * Label anchor for a region: the vertex mean of the first ring. For a
 * MultiPolygon only the first ring of the first polygon is used, so multi-part
 * regions anchor on their first part.
 */
export function regionCentroid(geometry: RegionGeometry): [number, number] {
  const first = polygonsOf(geometry)[0]?.[0];
  if (!first) {
    throw new GeometryShapeError(`${geometry.type} has no rings`);
  }
  return ringCentroid(first);
}
