import type { PuzzleTile, Rect, Size } from "./types";
import { rectHeight, rectWidth } from "./geometry";
import { createLogger } from "./logger";

const log = createLogger("renderer");

export const BORDER_COLOR = "#ff0000";
export const BORDER_WIDTH = 2;

export type DrawCommand =
  | { kind: "clear"; width: number; height: number }
  | { kind: "blit"; tileId: number; src: Rect; dest: Rect }
  | { kind: "outline"; rect: Rect };

/** The part of CanvasRenderingContext2D the renderer draws with */
export interface PaintSurface {
  strokeStyle: string | CanvasGradient | CanvasPattern;
  lineWidth: number;
  clearRect(x: number, y: number, w: number, h: number): void;
  drawImage(
    image: CanvasImageSource,
    sx: number,
    sy: number,
    sw: number,
    sh: number,
    dx: number,
    dy: number,
    dw: number,
    dh: number
  ): void;
  strokeRect(x: number, y: number, w: number, h: number): void;
}

/** Off-screen canvas the frame is composed in before being copied out */
export interface FrameBuffer {
  canvas: CanvasImageSource;
  surface: PaintSurface;
  width: number;
  height: number;
}

export interface DrawOptions {
  canvas: Size;
  showBorders: boolean;
}

/**
 * Draw call sequence for one frame: clear, one blit per tile in ascending id
 * order (later tiles cover earlier ones), then the optional outlines.
 */
export function buildDrawCommands(
  tiles: readonly PuzzleTile[],
  canvas: Size,
  showBorders: boolean
): DrawCommand[] {
  if (tiles.length === 0) return [];

  const ordered = [...tiles].sort((a, b) => a.id - b.id);
  const commands: DrawCommand[] = [
    { kind: "clear", width: canvas.width, height: canvas.height },
  ];
  for (const tile of ordered) {
    commands.push({ kind: "blit", tileId: tile.id, src: tile.srcRect, dest: tile.destRect });
  }
  if (showBorders) {
    for (const tile of ordered) {
      commands.push({ kind: "outline", rect: tile.destRect });
    }
  }
  return commands;
}

export function paintCommands(
  surface: PaintSurface,
  image: CanvasImageSource,
  commands: readonly DrawCommand[]
): void {
  for (const cmd of commands) {
    switch (cmd.kind) {
      case "clear":
        surface.clearRect(0, 0, cmd.width, cmd.height);
        break;
      case "blit":
        surface.drawImage(
          image,
          cmd.src.left,
          cmd.src.top,
          rectWidth(cmd.src),
          rectHeight(cmd.src),
          cmd.dest.left,
          cmd.dest.top,
          rectWidth(cmd.dest),
          rectHeight(cmd.dest)
        );
        break;
      case "outline":
        surface.strokeStyle = BORDER_COLOR;
        surface.lineWidth = BORDER_WIDTH;
        surface.strokeRect(cmd.rect.left, cmd.rect.top, rectWidth(cmd.rect), rectHeight(cmd.rect));
        break;
    }
  }
}

/**
 * Paint one frame. With a buffer of the canvas size the frame is composed
 * off-screen and copied to the visible surface in a single call.
 * Returns false when there was nothing to draw.
 */
export function drawFrame(
  visible: PaintSurface,
  image: CanvasImageSource | null,
  tiles: readonly PuzzleTile[],
  options: DrawOptions,
  buffer?: FrameBuffer | null
): boolean {
  if (!image) return false;
  const commands = buildDrawCommands(tiles, options.canvas, options.showBorders);
  if (commands.length === 0) return false;

  const { width, height } = options.canvas;
  if (buffer && buffer.width === width && buffer.height === height) {
    paintCommands(buffer.surface, image, commands);
    visible.clearRect(0, 0, width, height);
    visible.drawImage(buffer.canvas, 0, 0, width, height, 0, 0, width, height);
    return true;
  }

  if (buffer) {
    log.debug("frame buffer size mismatch, drawing directly", {
      buffer: { width: buffer.width, height: buffer.height },
      canvas: options.canvas,
    });
  }
  paintCommands(visible, image, commands);
  return true;
}
