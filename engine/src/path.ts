import type { Position, ProjectionFn, RegionGeometry } from "./types.js";
import { ringsOf } from "./geometry.js";

function formatPoint([x, y]: [number, number]): string {
  return `${x.toFixed(1)} ${y.toFixed(1)}`;
}

/** One closed subpath per ring; every vertex is kept, in source order. */
export function buildRingPath(ring: Position[], project: ProjectionFn): string {
  const commands = ring.map((coord, i) => {
    const point = formatPoint(project([coord[0], coord[1]]));
    return i === 0 ? `M${point}` : `L${point}`;
  });
  commands.push("Z");
  return commands.join(" ");
}

/** Ring paths for a Polygon or, flattened across its polygons, a MultiPolygon. */
export function buildPaths(geometry: RegionGeometry, project: ProjectionFn): string[] {
  return ringsOf(geometry).map((ring) => buildRingPath(ring, project));
}
