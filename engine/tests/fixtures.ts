import { fileURLToPath } from "node:url";
import type { FontConfig, Region } from "../src/types.js";

/** Lato Regular (SIL Open Font License), enough to draw digits and the footer. */
export const fontFile = fileURLToPath(new URL("./fixtures/Lato-Regular.ttf", import.meta.url));

export const testFont: FontConfig = { family: "Lato", files: { 400: fontFile } };

/** Hokkaido-ish square, far north-east of the others. */
export const northRegion: Region = {
  id: 1,
  geometry: {
    type: "Polygon",
    coordinates: [
      [
        [140, 42],
        [142, 42],
        [142, 44],
        [140, 44],
        [140, 42],
      ],
    ],
  },
};

export const capitalRegion: Region = {
  id: 13,
  geometry: {
    type: "Polygon",
    coordinates: [
      [
        [139, 35],
        [140, 35],
        [140, 36],
        [139, 36],
        [139, 35],
      ],
    ],
  },
};

/** Square west of region 13 with a square hole in it. */
export const holedRegion: Region = {
  id: 14,
  geometry: {
    type: "Polygon",
    coordinates: [
      [
        [138, 35],
        [139, 35],
        [139, 36],
        [138, 36],
        [138, 35],
      ],
      [
        [138.4, 35.4],
        [138.4, 35.6],
        [138.6, 35.6],
        [138.6, 35.4],
        [138.4, 35.4],
      ],
    ],
  },
};

export const islandRegion: Region = {
  id: 47,
  geometry: {
    type: "MultiPolygon",
    coordinates: [
      [
        [
          [127, 26],
          [128, 26],
          [128, 27],
          [127, 27],
          [127, 26],
        ],
      ],
      [
        [
          [124, 24],
          [125, 24],
          [125, 25],
          [124, 25],
          [124, 24],
        ],
      ],
    ],
  },
};

export const regions: Region[] = [northRegion, capitalRegion, holedRegion, islandRegion];
