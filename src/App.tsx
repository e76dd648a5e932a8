import { useMemo, useState } from "react";
import { PuzzleBoard } from "./PuzzleBoard";
import { resolvePuzzleConfig, type PuzzleConfig } from "./config";
import type { DragMode } from "./types";

interface AppProps {
  config?: PuzzleConfig;
}

function App({ config: configOverride }: AppProps) {
  const config = useMemo(
    () => configOverride ?? resolvePuzzleConfig(window.location.search),
    [configOverride]
  );
  const [showBorders, setShowBorders] = useState(config.showBorders);
  const [dragMode, setDragMode] = useState<DragMode>(config.dragMode);

  return (
    <div
      style={{
        display: "flex",
        flexDirection: "column",
        height: "100vh",
        fontFamily: "sans-serif",
      }}
    >
      <header
        style={{
          display: "flex",
          alignItems: "center",
          justifyContent: "space-between",
          gap: 16,
          padding: 16,
        }}
      >
        <h1 style={{ margin: 0, fontSize: 22 }}>Drag Puzzle</h1>
        <div style={{ display: "flex", alignItems: "center", gap: 16 }}>
          <label>
            Drag{" "}
            <select
              value={dragMode}
              onChange={(e) => setDragMode(e.target.value === "point" ? "point" : "delta")}
            >
              <option value="delta">Follow movement</option>
              <option value="point">Centre on pointer</option>
            </select>
          </label>
          <label>
            <input
              type="checkbox"
              checked={showBorders}
              onChange={(e) => setShowBorders(e.target.checked)}
            />{" "}
            Debug
          </label>
        </div>
      </header>

      <PuzzleBoard
        imageUrl={config.imageUrl}
        layoutConfig={config.layout}
        dragMode={dragMode}
        showBorders={showBorders}
      />

      <section
        style={{
          margin: 16,
          padding: 16,
          borderRadius: 12,
          background: "#e8ddff",
          lineHeight: 1.5,
        }}
      >
        Drag the puzzle tiles to rearrange them. Toggle debug to see tile boundaries.
      </section>
    </div>
  );
}

export default App;
