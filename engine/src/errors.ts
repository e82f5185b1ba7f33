export type MapErrorKind = "input" | "dataset" | "geometry" | "rendering";
export type RenderStage = "font" | "rasterize" | "encode";

export class MapRenderError extends Error {
  readonly kind: MapErrorKind;

  constructor(kind: MapErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MapRenderError";
    this.kind = kind;
  }
}

/** Missing or unparseable intensity payload, or a scale outside 0–7. */
export class InputValidationError extends MapRenderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("input", message, options);
    this.name = "InputValidationError";
  }
}

export class DatasetError extends MapRenderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("dataset", message, options);
    this.name = "DatasetError";
  }
}

export class GeometryShapeError extends MapRenderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("geometry", message, options);
    this.name = "GeometryShapeError";
  }
}

export class RenderingError extends MapRenderError {
  readonly stage: RenderStage;

  constructor(stage: RenderStage, message: string, options?: { cause?: unknown }) {
    super("rendering", message, options);
    this.name = "RenderingError";
    this.stage = stage;
  }
}

export function isClientError(error: unknown): error is InputValidationError {
  return error instanceof MapRenderError && error.kind === "input";
}

export function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  if (error.cause instanceof Error) return `${error.message}: ${error.cause.message}`;
  return error.message;
}
