import type { GridModel, SearchResult } from "../../interfaces/interfaces";
import { idOf } from "../utils";

export type CellKind = "wall" | "open" | "explored" | "path" | "start" | "goal";

// Row-major kind of every cell; start/goal win over path, path over explored
export function classifyCells(
  grid: GridModel,
  result: SearchResult | null,
  showExplored = false
): CellKind[] {
  const { width, blocks, start, goal } = grid;
  const kinds: CellKind[] = Array.from(blocks, (b): CellKind => (b === 1 ? "wall" : "open"));
  if (result && showExplored) {
    for (const { r, c } of result.explored) kinds[idOf(width, r, c)] = "explored";
  }
  if (result?.solution) {
    for (const { r, c } of result.solution.cells) kinds[idOf(width, r, c)] = "path";
  }
  kinds[idOf(width, goal.r, goal.c)] = "goal";
  kinds[idOf(width, start.r, start.c)] = "start";
  return kinds;
}

const GLYPH: Record<CellKind, string> = {
  wall: "▉",
  open: " ",
  explored: "·",
  path: "*",
  start: "A",
  goal: "B",
};

export function renderText(
  grid: GridModel,
  result: SearchResult | null = null,
  showExplored = false
) {
  const kinds = classifyCells(grid, result, showExplored);
  const rows: string[] = [];
  for (let r = 0; r < grid.height; r++) {
    rows.push(
      kinds
        .slice(r * grid.width, (r + 1) * grid.width)
        .map((k) => GLYPH[k])
        .join("")
    );
  }
  return rows.join("\n");
}
