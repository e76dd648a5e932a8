import type { Point, PuzzleTile, Rect } from "./types";

export function rectWidth(rect: Rect): number {
  return rect.right - rect.left;
}

export function rectHeight(rect: Rect): number {
  return rect.bottom - rect.top;
}

/** Check if a point is inside a rect, edges included */
export function rectContains(rect: Rect, point: Point): boolean {
  const [x, y] = point;
  return x >= rect.left && x <= rect.right && y >= rect.top && y <= rect.bottom;
}

/** Move a rect by (dx, dy) keeping its size */
export function translateRect(rect: Rect, dx: number, dy: number): Rect {
  return {
    left: rect.left + dx,
    top: rect.top + dy,
    right: rect.right + dx,
    bottom: rect.bottom + dy,
  };
}

/** Move a rect so that its centre lands on `point` */
export function centerRectOn(rect: Rect, point: Point): Rect {
  const w = rectWidth(rect);
  const h = rectHeight(rect);
  const left = point[0] - w / 2;
  const top = point[1] - h / 2;
  return { left, top, right: left + w, bottom: top + h };
}

/**
 * Find the tile under a point. Tiles are scanned in collection order, so when
 * dragged tiles overlap the one with the lowest id wins.
 */
export function findTileAt(tiles: readonly PuzzleTile[], point: Point): PuzzleTile | null {
  for (const tile of tiles) {
    if (rectContains(tile.destRect, point)) return tile;
  }
  return null;
}
