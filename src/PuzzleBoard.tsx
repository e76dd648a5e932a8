import React, { useCallback, useEffect, useRef, useState } from "react";
import type { DragMode, LayoutConfig, Point } from "./types";
import { usePuzzleStore } from "./usePuzzleStore";
import { drawFrame, type FrameBuffer } from "./renderer";
import { createLogger } from "./logger";

const log = createLogger("board");

interface PuzzleBoardProps {
  imageUrl: string;
  layoutConfig: LayoutConfig;
  dragMode: DragMode;
  showBorders: boolean;
}

function createFrameBuffer(width: number, height: number): FrameBuffer | null {
  const canvas = document.createElement("canvas");
  canvas.width = width;
  canvas.height = height;
  const surface = canvas.getContext("2d");
  if (!surface) return null;
  return { canvas, surface, width, height };
}

export const PuzzleBoard: React.FC<PuzzleBoardProps> = ({
  imageUrl,
  layoutConfig,
  dragMode,
  showBorders,
}) => {
  const store = usePuzzleStore(dragMode);
  const boardRef = useRef<HTMLDivElement>(null);
  const canvasRef = useRef<HTMLCanvasElement>(null);
  const bufferRef = useRef<FrameBuffer | null>(null);
  // Whether the visible canvas currently holds a frame
  const drawnRef = useRef(false);
  const [boardSize, setBoardSize] = useState({ width: 0, height: 0 });
  const [image, setImage] = useState<HTMLImageElement | null>(null);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);

  // Last pointer position, for turning absolute moves into deltas
  const lastPointRef = useRef<Point | null>(null);

  const { setDragMode, layout } = store;
  useEffect(() => {
    setDragMode(dragMode);
  }, [dragMode, setDragMode]);

  // Measure board
  useEffect(() => {
    const measure = () => {
      const board = boardRef.current;
      if (!board) return;
      const rect = board.getBoundingClientRect();
      setBoardSize({
        width: Math.floor(rect.width),
        height: Math.floor(rect.height),
      });
    };
    measure();
    window.addEventListener("resize", measure);
    return () => window.removeEventListener("resize", measure);
  }, []);

  // Load image
  useEffect(() => {
    let cancelled = false;
    setLoading(true);
    setError(null);

    const img = new Image();
    img.onload = () => {
      if (cancelled) return;
      log.info("image loaded", { imageUrl, width: img.naturalWidth, height: img.naturalHeight });
      setImage(img);
      setLoading(false);
    };
    img.onerror = () => {
      if (cancelled) return;
      log.error("image failed to load", { imageUrl });
      setImage(null);
      setError("Failed to load the puzzle image. Please refresh to try again.");
      setLoading(false);
    };
    img.src = imageUrl;

    return () => {
      cancelled = true;
    };
  }, [imageUrl]);

  // Rebuild the tiles whenever the board or the image changes
  useEffect(() => {
    const imageSize = image ? { width: image.naturalWidth, height: image.naturalHeight } : null;
    layout(boardSize, imageSize, layoutConfig);
  }, [boardSize, image, layoutConfig, layout]);

  useEffect(() => {
    const { width, height } = boardSize;
    bufferRef.current = width > 0 && height > 0 ? createFrameBuffer(width, height) : null;
  }, [boardSize]);

  // Redraw after every state change
  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;

    if (!image || store.tiles.length === 0) {
      // Wipe the last frame so an empty layout shows nothing
      if (!drawnRef.current) return;
      canvas.getContext("2d")?.clearRect(0, 0, boardSize.width, boardSize.height);
      drawnRef.current = false;
      return;
    }

    const ctx = canvas.getContext("2d");
    if (!ctx) {
      log.error("2D context unavailable, skipping frame");
      return;
    }
    drawnRef.current = drawFrame(ctx, image, store.tiles, { canvas: boardSize, showBorders }, bufferRef.current);
  }, [image, store.tiles, boardSize, showBorders]);

  const toLocal = useCallback((e: React.PointerEvent): Point => {
    const rect = canvasRef.current?.getBoundingClientRect();
    if (!rect) return [e.clientX, e.clientY];
    return [e.clientX - rect.left, e.clientY - rect.top];
  }, []);

  const handlePointerDown = useCallback(
    (e: React.PointerEvent<HTMLCanvasElement>) => {
      e.preventDefault();
      e.currentTarget.setPointerCapture(e.pointerId);
      const point = toLocal(e);
      lastPointRef.current = point;
      store.startDrag(point);
      log.debug("drag start", { x: point[0], y: point[1] });
    },
    [store, toLocal]
  );

  const handlePointerMove = useCallback(
    (e: React.PointerEvent<HTMLCanvasElement>) => {
      const last = lastPointRef.current;
      if (!last || store.activeId === null) return;
      const point = toLocal(e);
      lastPointRef.current = point;
      if (store.dragMode === "point") {
        store.dragTo(point);
      } else {
        store.dragBy(point[0] - last[0], point[1] - last[1]);
      }
    },
    [store, toLocal]
  );

  const handlePointerUp = useCallback(() => {
    if (lastPointRef.current === null) return;
    lastPointRef.current = null;
    if (store.activeId !== null) {
      log.debug("drag end", { id: store.activeId });
    }
    store.endDrag();
  }, [store]);

  if (error) {
    return (
      <div
        role="alert"
        style={{
          display: "flex",
          alignItems: "center",
          justifyContent: "center",
          flex: 1,
          color: "#ff6b6b",
          fontSize: "18px",
          fontFamily: "sans-serif",
          padding: "20px",
          textAlign: "center",
        }}
      >
        {error}
      </div>
    );
  }

  return (
    <div
      ref={boardRef}
      style={{
        flex: 1,
        minHeight: 0,
        overflow: "hidden",
        position: "relative",
        userSelect: "none",
        touchAction: "none",
      }}
    >
      {loading && (
        <div
          style={{
            position: "absolute",
            top: "50%",
            left: "50%",
            transform: "translate(-50%, -50%)",
            fontSize: "20px",
            fontFamily: "sans-serif",
          }}
        >
          Loading image...
        </div>
      )}

      <canvas
        ref={canvasRef}
        data-testid="puzzle-canvas"
        width={boardSize.width}
        height={boardSize.height}
        style={{
          display: "block",
          width: "100%",
          height: "100%",
          cursor: store.activeId === null ? "grab" : "grabbing",
        }}
        onPointerDown={handlePointerDown}
        onPointerMove={handlePointerMove}
        onPointerUp={handlePointerUp}
        onPointerCancel={handlePointerUp}
      />

      {store.tiles.length > 0 && (
        <button
          onClick={store.reset}
          style={{
            position: "absolute",
            top: 16,
            right: 16,
            padding: "8px 16px",
            borderRadius: 8,
            border: "none",
            background: "rgba(0,0,0,0.6)",
            color: "white",
            fontSize: 14,
            cursor: "pointer",
          }}
          title="Put every tile back"
        >
          Reset
        </button>
      )}
    </div>
  );
};
