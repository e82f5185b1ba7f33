/**
 * Input side of the map pipeline: geometry datasets, intensity payloads and
 * render options, decoupled from the core engine.
 */
export {
  parseDataset,
  loadDataset,
  createDatasetLoader,
  type DatasetLoader,
  type DatasetLoaderOptions,
  type DatasetOptions,
} from "./dataset.js";

export { parseIntensityPayload, buildIntensityAssignment, MIN_SCALE, MAX_SCALE } from "./intensity.js";

export { parseRenderQuery, parseSizeClass, type RenderRequest } from "./query.js";
