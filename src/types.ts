export type Point = [number, number];

export interface Size {
  width: number;
  height: number;
}

/** Axis-aligned rectangle in pixels; left < right and top < bottom */
export interface Rect {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface PuzzleTile {
  /** row * cols + col, stable for the lifetime of one layout */
  id: number;
  /** Region of the source image this tile shows, in image pixels */
  srcRect: Rect;
  /** Where the tile is currently drawn, in canvas pixels */
  destRect: Rect;
}

/**
 * "delta" translates the dragged tile by each pointer movement,
 * "point" re-centres it on the pointer.
 */
export type DragMode = "delta" | "point";

export interface LayoutConfig {
  rows: number;
  cols: number;
  /** Share of the canvas width the board tries to occupy */
  widthFraction: number;
  /** Share of the canvas height used when the width share does not fit */
  heightFraction: number;
}
