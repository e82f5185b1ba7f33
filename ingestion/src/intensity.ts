import {
  InputValidationError,
  describeError,
  type IntensityAssignment,
  type IntensityLevel,
  type IntensityQuery,
  type RegionID,
} from "prefecture-map-engine";
import { isRecord } from "./guards.js";

export const MIN_SCALE = 0;
export const MAX_SCALE = 7;

function integerField(item: Record<string, unknown>, key: "id" | "scale", index: number): number {
  const value = item[key];
  if (value === undefined || value === null) return 0;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new InputValidationError(`Invalid scale data format: item ${index} field "${key}" must be an integer`);
  }
  return value;
}

/**
 * Parse the `[{"id": 13, "scale": 5}, ...]` payload. Absent fields read as 0;
 * range checks happen in `buildIntensityAssignment`.
 */
export function parseIntensityPayload(raw: string | undefined): IntensityQuery[] {
  if (!raw) {
    throw new InputValidationError("scale parameter is required");
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new InputValidationError(`Invalid scale data format: ${describeError(err)}`, { cause: err });
  }
  if (data === null) return [];
  if (!Array.isArray(data)) {
    throw new InputValidationError("Invalid scale data format: expected an array of {id, scale} objects");
  }
  return data.map((item: unknown, index) => {
    if (!isRecord(item)) {
      throw new InputValidationError(`Invalid scale data format: item ${index} is not an object`);
    }
    return { id: integerField(item, "id", index), scale: integerField(item, "scale", index) };
  });
}

/** Validate every level and index it by region. Later entries win for repeated ids. */
export function buildIntensityAssignment(queries: readonly IntensityQuery[]): IntensityAssignment {
  const assignment = new Map<RegionID, IntensityLevel>();
  for (const { id, scale } of queries) {
    if (scale < MIN_SCALE || scale > MAX_SCALE) {
      throw new InputValidationError(`Invalid scale value for ID ${id}: ${scale}`);
    }
    assignment.set(id, scale);
  }
  return assignment;
}
