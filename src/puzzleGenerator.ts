import type { LayoutConfig, PuzzleTile, Rect, Size } from "./types";

/**
 * Square area the puzzle occupies, centred in the canvas.
 * The side is `widthFraction` of the canvas width, unless that is taller than
 * the canvas, in which case it is `heightFraction` of the canvas height.
 */
export function computeBoardRect(canvas: Size, config: LayoutConfig): Rect | null {
  const { width, height } = canvas;
  if (!(width > 0) || !(height > 0)) return null;

  const candidate = config.widthFraction * width;
  const side = candidate > height ? height * config.heightFraction : candidate;
  if (!(side > 0)) return null;

  const left = (width - side) / 2;
  const top = (height - side) / 2;
  return { left, top, right: left + side, bottom: top + side };
}

/**
 * Split the image into a rows x cols grid and lay the cells out over the board.
 * Returns an empty list when there is nothing sensible to draw.
 */
export function generateTiles(
  canvas: Size,
  image: Size | null,
  config: LayoutConfig
): PuzzleTile[] {
  if (!image || !(image.width > 0) || !(image.height > 0)) return [];

  const { rows, cols } = config;
  if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows < 1 || cols < 1) {
    return [];
  }

  const board = computeBoardRect(canvas, config);
  if (!board) return [];

  const cellW = (board.right - board.left) / cols;
  const cellH = (board.bottom - board.top) / rows;
  const srcCellW = image.width / cols;
  const srcCellH = image.height / rows;

  const tiles: PuzzleTile[] = [];
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      // Neighbouring cells share edges through the same expression, so the
      // grid has no gaps or overlaps.
      tiles.push({
        id: r * cols + c,
        srcRect: {
          left: c * srcCellW,
          top: r * srcCellH,
          right: (c + 1) * srcCellW,
          bottom: (r + 1) * srcCellH,
        },
        destRect: {
          left: board.left + c * cellW,
          top: board.top + r * cellH,
          right: board.left + (c + 1) * cellW,
          bottom: board.top + (r + 1) * cellH,
        },
      });
    }
  }

  return tiles;
}
