import { describe, expect, it } from "vitest";
import type { PuzzleTile } from "./types";
import {
  BORDER_COLOR,
  BORDER_WIDTH,
  buildDrawCommands,
  drawFrame,
  paintCommands,
  type FrameBuffer,
} from "./renderer";
import { RecordingSurface } from "./testing/RecordingSurface";

const TILES: PuzzleTile[] = [
  {
    id: 1,
    srcRect: { left: 50, top: 0, right: 100, bottom: 50 },
    destRect: { left: 20, top: 10, right: 40, bottom: 30 },
  },
  {
    id: 0,
    srcRect: { left: 0, top: 0, right: 50, bottom: 50 },
    destRect: { left: 0, top: 10, right: 20, bottom: 30 },
  },
];

const CANVAS = { width: 60, height: 40 };

describe("buildDrawCommands", () => {
  it("clears, then blits in ascending id order", () => {
    expect(buildDrawCommands(TILES, CANVAS, false)).toEqual([
      { kind: "clear", width: 60, height: 40 },
      { kind: "blit", tileId: 0, src: TILES[1].srcRect, dest: TILES[1].destRect },
      { kind: "blit", tileId: 1, src: TILES[0].srcRect, dest: TILES[0].destRect },
    ]);
  });

  it("appends outlines after every blit when borders are on", () => {
    const commands = buildDrawCommands(TILES, CANVAS, true);
    expect(commands.map((c) => c.kind)).toEqual(["clear", "blit", "blit", "outline", "outline"]);
    expect(commands[3]).toEqual({ kind: "outline", rect: TILES[1].destRect });
  });

  it("emits nothing for an empty collection", () => {
    expect(buildDrawCommands([], CANVAS, true)).toEqual([]);
  });
});

describe("paintCommands", () => {
  it("replays commands on the surface", () => {
    const surface = new RecordingSurface();
    const image = document.createElement("img");
    paintCommands(surface, image, buildDrawCommands(TILES, CANVAS, true));

    expect(surface.calls).toEqual([
      ["clearRect", 0, 0, 60, 40],
      ["drawImage", image, 0, 0, 50, 50, 0, 10, 20, 20],
      ["drawImage", image, 50, 0, 50, 50, 20, 10, 20, 20],
      ["strokeRect", 0, 10, 20, 20, BORDER_COLOR, BORDER_WIDTH],
      ["strokeRect", 20, 10, 20, 20, BORDER_COLOR, BORDER_WIDTH],
    ]);
  });
});

describe("drawFrame", () => {
  it("composes in the buffer and copies it out once", () => {
    const visible = new RecordingSurface();
    const bufferSurface = new RecordingSurface();
    const bufferCanvas = document.createElement("canvas");
    const buffer: FrameBuffer = { canvas: bufferCanvas, surface: bufferSurface, width: 60, height: 40 };
    const image = document.createElement("img");

    const drawn = drawFrame(visible, image, TILES, { canvas: CANVAS, showBorders: false }, buffer);

    expect(drawn).toBe(true);
    expect(bufferSurface.calls).toHaveLength(3);
    expect(visible.calls).toEqual([
      ["clearRect", 0, 0, 60, 40],
      ["drawImage", bufferCanvas, 0, 0, 60, 40, 0, 0, 60, 40],
    ]);
  });

  it("draws directly when the buffer size is stale", () => {
    const visible = new RecordingSurface();
    const bufferSurface = new RecordingSurface();
    const buffer: FrameBuffer = {
      canvas: document.createElement("canvas"),
      surface: bufferSurface,
      width: 10,
      height: 10,
    };

    drawFrame(visible, document.createElement("img"), TILES, { canvas: CANVAS, showBorders: false }, buffer);

    expect(bufferSurface.calls).toEqual([]);
    expect(visible.calls).toHaveLength(3);
  });

  it("draws directly without a buffer", () => {
    const visible = new RecordingSurface();
    drawFrame(visible, document.createElement("img"), TILES, { canvas: CANVAS, showBorders: true });
    expect(visible.calls).toHaveLength(5);
  });

  it("draws nothing without an image or tiles", () => {
    const visible = new RecordingSurface();
    expect(drawFrame(visible, null, TILES, { canvas: CANVAS, showBorders: true })).toBe(false);
    expect(
      drawFrame(visible, document.createElement("img"), [], { canvas: CANVAS, showBorders: true })
    ).toBe(false);
    expect(visible.calls).toEqual([]);
  });
});
