import { useCallback, useReducer } from "react";
import type { DragMode, LayoutConfig, Point, PuzzleTile, Size } from "./types";
import { generateTiles } from "./puzzleGenerator";
import { centerRectOn, findTileAt, translateRect } from "./geometry";
import { createLogger } from "./logger";

const log = createLogger("store");

export interface PuzzleState {
  /** Tiles as generated, used by RESET */
  layout: PuzzleTile[];
  tiles: PuzzleTile[];
  /** Id of the tile being dragged; null while idle */
  activeId: number | null;
  dragMode: DragMode;
}

export type Action =
  | { type: "LAYOUT"; tiles: PuzzleTile[] }
  | { type: "DRAG_START"; point: Point }
  | { type: "DRAG_BY"; dx: number; dy: number }
  | { type: "DRAG_TO"; point: Point }
  | { type: "DRAG_END" }
  | { type: "RESET" }
  | { type: "SET_DRAG_MODE"; mode: DragMode };

export function createInitialState(dragMode: DragMode = "delta"): PuzzleState {
  return {
    layout: [],
    tiles: [],
    activeId: null,
    dragMode,
  };
}

function updateActive(
  state: PuzzleState,
  move: (tile: PuzzleTile) => PuzzleTile
): PuzzleState {
  if (state.activeId === null) return state;
  const id = state.activeId;
  return {
    ...state,
    tiles: state.tiles.map((t) => (t.id === id ? move(t) : t)),
  };
}

export function puzzleReducer(state: PuzzleState, action: Action): PuzzleState {
  switch (action.type) {
    case "LAYOUT":
      return {
        ...state,
        layout: action.tiles,
        tiles: action.tiles,
        activeId: null,
      };

    case "DRAG_START": {
      const hit = findTileAt(state.tiles, action.point);
      if (!hit) return state;
      return { ...state, activeId: hit.id };
    }

    case "DRAG_BY":
      return updateActive(state, (t) => ({
        ...t,
        destRect: translateRect(t.destRect, action.dx, action.dy),
      }));

    case "DRAG_TO":
      return updateActive(state, (t) => ({
        ...t,
        destRect: centerRectOn(t.destRect, action.point),
      }));

    case "DRAG_END":
      if (state.activeId === null) return state;
      return { ...state, activeId: null };

    case "RESET":
      return { ...state, tiles: state.layout, activeId: null };

    case "SET_DRAG_MODE":
      return { ...state, dragMode: action.mode };

    default:
      return state;
  }
}

export function usePuzzleStore(initialDragMode: DragMode = "delta") {
  const [state, dispatch] = useReducer(puzzleReducer, initialDragMode, createInitialState);

  const layout = useCallback(
    (canvas: Size, image: Size | null, config: LayoutConfig) => {
      const tiles = generateTiles(canvas, image, config);
      log.debug("layout rebuilt", {
        canvas,
        image,
        tiles: tiles.length,
      });
      dispatch({ type: "LAYOUT", tiles });
    },
    []
  );

  const startDrag = useCallback((point: Point) => {
    dispatch({ type: "DRAG_START", point });
  }, []);

  const dragBy = useCallback((dx: number, dy: number) => {
    dispatch({ type: "DRAG_BY", dx, dy });
  }, []);

  const dragTo = useCallback((point: Point) => {
    dispatch({ type: "DRAG_TO", point });
  }, []);

  const endDrag = useCallback(() => {
    dispatch({ type: "DRAG_END" });
  }, []);

  const reset = useCallback(() => {
    dispatch({ type: "RESET" });
  }, []);

  const setDragMode = useCallback((mode: DragMode) => {
    dispatch({ type: "SET_DRAG_MODE", mode });
  }, []);

  return {
    tiles: state.tiles,
    activeId: state.activeId,
    dragMode: state.dragMode,
    layout,
    startDrag,
    dragBy,
    dragTo,
    endDrag,
    reset,
    setDragMode,
  };
}
