import type { GridModel } from "../../interfaces/interfaces";
import type { Coordinate } from "../../types/types";
import { idOf, rcOf, rngLCG } from "../utils";

// ---------- Map Generation ----------
export function generateEmpty(height: number, width: number) {
  const blocks = new Uint8Array(height * width); // 0 free, 1 wall
  return blocks;
}

// Random walls at the given density; start and goal stay open
export function generateRandom(
  height: number,
  width: number,
  density: number,
  seed: number,
  start: Coordinate,
  goal: Coordinate
) {
  const R = rngLCG(seed);
  const blocks = generateEmpty(height, width).map(() =>
    R.next().value < density ? 1 : 0
  );
  for (const at of [start, goal]) blocks[idOf(width, at.r, at.c)] = 0;
  return blocks;
}

const ROOM_STEPS: [number, number][] = [
  [-2, 0],
  [0, -2],
  [0, 2],
  [2, 0],
];

// Perfect maze by randomized backtracking. Rooms sit on odd rows and columns
// inside the border; joining two rooms opens the cell between them.
export function generateMaze(height: number, width: number, seed: number) {
  const blocks = new Uint8Array(height * width).fill(1);
  const R = rngLCG(seed);
  const open = (at: Coordinate) => {
    blocks[idOf(width, at.r, at.c)] = 0;
  };
  const isClosedRoom = (at: Coordinate) =>
    at.r % 2 === 1 &&
    at.c % 2 === 1 &&
    at.r < height - 1 &&
    at.c < width - 1 &&
    blocks[idOf(width, at.r, at.c)] === 1;

  const origin = height > 2 && width > 2 ? { r: 1, c: 1 } : { r: 0, c: 0 };
  open(origin);
  const trail: Coordinate[] = [origin];

  while (trail.length) {
    const cur = trail[trail.length - 1];
    const options = ROOM_STEPS.map(([dr, dc]) => ({ r: cur.r + dr, c: cur.c + dc })).filter(
      isClosedRoom
    );
    if (!options.length) {
      trail.pop();
      continue;
    }
    const next = options[Math.floor(R.next().value * options.length)];
    open({ r: (cur.r + next.r) / 2, c: (cur.c + next.c) / 2 });
    open(next);
    trail.push(next);
  }

  return blocks;
}

// First and last open cell in row-major order, or the corners if fewer than two are open
export function pickCorners(height: number, width: number, blocks: Uint8Array) {
  let first = -1,
    last = -1;
  for (let i = 0; i < blocks.length; i++) {
    if (blocks[i] !== 0) continue;
    if (first < 0) first = i;
    last = i;
  }
  if (first < 0 || first === last) {
    const start = { r: 0, c: 0 };
    const goal = { r: height - 1, c: width - 1 };
    blocks[idOf(width, start.r, start.c)] = 0;
    blocks[idOf(width, goal.r, goal.c)] = 0;
    return { start, goal };
  }
  return { start: rcOf(width, first), goal: rcOf(width, last) };
}

export const buildGrid = (
  height: number,
  width: number,
  blocks: Uint8Array,
  start: Coordinate,
  goal: Coordinate
): GridModel => ({ height, width, blocks, start, goal });
