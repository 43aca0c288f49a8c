import type { CellKind } from "./render/renderText";

export const map_color_constants: Record<CellKind, string> = {
  open: "#ffffff",
  wall: "#0f172a", // slate-900
  explored: "#fde68a", // amber-200
  path: "#86efac", // green-300
  start: "#16a34a",
  goal: "#7c3aed",
};
