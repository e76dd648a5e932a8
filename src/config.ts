import { createLogger } from "./logger";
import type { DragMode, LayoutConfig } from "./types";

const log = createLogger("config");

export interface PuzzleConfig {
  layout: LayoutConfig;
  dragMode: DragMode;
  showBorders: boolean;
  imageUrl: string;
}

export const MAX_GRID = 8;

export const DEFAULT_CONFIG: PuzzleConfig = {
  layout: {
    rows: 3,
    cols: 3,
    widthFraction: 0.6,
    heightFraction: 0.9,
  },
  dragMode: "delta",
  showBorders: false,
  imageUrl: "/mountain.svg",
};

function parseGridSize(params: URLSearchParams, key: "rows" | "cols", fallback: number): number {
  const raw = params.get(key);
  if (raw === null) return fallback;
  const n = Number(raw);
  if (Number.isInteger(n) && n >= 1 && n <= MAX_GRID) return n;
  log.warn(`ignoring ${key}=${raw}, expected an integer from 1 to ${MAX_GRID}`);
  return fallback;
}

function parseDragMode(params: URLSearchParams, fallback: DragMode): DragMode {
  const raw = params.get("drag");
  if (raw === null) return fallback;
  if (raw === "delta" || raw === "point") return raw;
  log.warn(`ignoring drag=${raw}, expected "delta" or "point"`);
  return fallback;
}

/**
 * Build the puzzle configuration from a URL query string
 * (`?debug&drag=point&rows=4&cols=4&image=...`).
 */
export function resolvePuzzleConfig(search: string): PuzzleConfig {
  const params = new URLSearchParams(search);
  const image = params.get("image");

  return {
    layout: {
      ...DEFAULT_CONFIG.layout,
      rows: parseGridSize(params, "rows", DEFAULT_CONFIG.layout.rows),
      cols: parseGridSize(params, "cols", DEFAULT_CONFIG.layout.cols),
    },
    dragMode: parseDragMode(params, DEFAULT_CONFIG.dragMode),
    showBorders: params.has("debug"),
    imageUrl: image ? image : DEFAULT_CONFIG.imageUrl,
  };
}
