import type { GridModel } from "../interfaces/interfaces";
import type { Action, Cell, Coordinate } from "../types/types";
import { InvalidGridError } from "../errors/errors";

export const idOf = (width: number, r: number, c: number) => r * width + c;
export const rcOf = (width: number, id: number): Coordinate => ({
  r: Math.floor(id / width),
  c: id % width,
});

export const sameCell = (a: Coordinate, b: Coordinate) =>
  a.r === b.r && a.c === b.c;

export const manhattan = (a: Coordinate, b: Coordinate) =>
  Math.abs(a.r - b.r) + Math.abs(a.c - b.c);

export const inBounds = (grid: GridModel, at: Coordinate) =>
  at.r >= 0 && at.r < grid.height && at.c >= 0 && at.c < grid.width;

export const cellAt = (grid: GridModel, at: Coordinate): Cell => ({
  at,
  blocked: grid.blocks[idOf(grid.width, at.r, at.c)] === 1,
});

// Deterministic RNG, 32-bit LCG
export function* rngLCG(seed: number): Generator<number, never, void> {
  let s = seed >>> 0 || 1;
  while (true) {
    s = (1664525 * s + 1013904223) >>> 0;
    yield s / 2 ** 32;
  }
}

export function validateGrid(grid: GridModel) {
  const { height, width, blocks, start, goal } = grid;
  if (!Number.isInteger(height) || !Number.isInteger(width)) {
    throw new InvalidGridError("grid dimensions must be integers");
  }
  if (height <= 0 || width <= 0) {
    throw new InvalidGridError(`grid has zero size (${height}x${width})`);
  }
  if (blocks.length !== height * width) {
    throw new InvalidGridError(
      `expected ${height * width} cells, got ${blocks.length}`
    );
  }
  const bad = blocks.findIndex((b) => b !== 0 && b !== 1);
  if (bad >= 0) {
    throw new InvalidGridError(`cell ${bad} holds ${blocks[bad]}, expected 0 or 1`);
  }
  for (const [label, at] of [
    ["start", start],
    ["goal", goal],
  ] as const) {
    if (!Number.isInteger(at.r) || !Number.isInteger(at.c)) {
      throw new InvalidGridError(`${label} (${at.r},${at.c}) is not a whole cell`);
    }
    if (!inBounds(grid, at)) {
      throw new InvalidGridError(`${label} (${at.r},${at.c}) is outside the grid`);
    }
    if (cellAt(grid, at).blocked) {
      throw new InvalidGridError(`${label} (${at.r},${at.c}) is a wall`);
    }
  }
}

// Up, left, right, down. The order decides which branch DFS dives into.
const MOVES: { dr: number; dc: number; action: Action }[] = [
  { dr: -1, dc: 0, action: "up" },
  { dr: 0, dc: -1, action: "left" },
  { dr: 0, dc: 1, action: "right" },
  { dr: 1, dc: 0, action: "down" },
];

// Open, in-bounds neighbors of a cell
export function neighbors(grid: GridModel, at: Coordinate) {
  const out: { at: Coordinate; action: Action }[] = [];
  for (const { dr, dc, action } of MOVES) {
    const next = { r: at.r + dr, c: at.c + dc };
    if (!inBounds(grid, next)) continue;
    if (cellAt(grid, next).blocked) continue;
    out.push({ at: next, action });
  }
  return out;
}

export function shuffleInPlace<T>(items: T[], rng: Generator<number, never, void>) {
  for (let i = 0; i < items.length; i++) {
    const j = Math.floor(rng.next().value * (i + 1));
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
}

export function step(at: Coordinate, action: Action): Coordinate {
  const move = MOVES.find((m) => m.action === action);
  if (!move) throw new Error(`unknown action ${action}`);
  return { r: at.r + move.dr, c: at.c + move.dc };
}
