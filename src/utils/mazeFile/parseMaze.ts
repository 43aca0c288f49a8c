import { readFile } from "node:fs/promises";
import type { GridModel } from "../../interfaces/interfaces";
import type { Coordinate } from "../../types/types";
import { MazeFormatError } from "../../errors/errors";
import { idOf } from "../utils";

// ---------- Maze text format ----------
// A or S: start, B or G: goal, #: wall, space or .: open
const START = new Set(["A", "S"]);
const GOAL = new Set(["B", "G"]);
const OPEN = new Set([" ", "."]);

export function parseMaze(text: string): GridModel {
  const lines = text.split(/\r?\n/);
  while (lines.length && lines[lines.length - 1] === "") lines.pop();
  if (!lines.length) throw new MazeFormatError("maze is empty");

  const height = lines.length;
  const width = Math.max(...lines.map((l) => l.length));
  const blocks = new Uint8Array(height * width).fill(1); // short rows stay walls
  let start: Coordinate | null = null;
  let goal: Coordinate | null = null;

  for (let r = 0; r < height; r++) {
    const line = lines[r];
    for (let c = 0; c < line.length; c++) {
      const ch = line[c];
      const id = idOf(width, r, c);
      if (ch === "#") continue;
      if (OPEN.has(ch)) {
        blocks[id] = 0;
      } else if (START.has(ch)) {
        if (start) throw new MazeFormatError("more than one start point", r + 1);
        start = { r, c };
        blocks[id] = 0;
      } else if (GOAL.has(ch)) {
        if (goal) throw new MazeFormatError("more than one goal point", r + 1);
        goal = { r, c };
        blocks[id] = 0;
      } else {
        throw new MazeFormatError(`unexpected character '${ch}'`, r + 1);
      }
    }
  }

  if (!start) throw new MazeFormatError("no start point 'A' found in the maze");
  if (!goal) throw new MazeFormatError("no goal point 'B' found in the maze");
  return { height, width, blocks, start, goal };
}

export async function loadMaze(fileName: string): Promise<GridModel> {
  let text: string;
  try {
    text = await readFile(fileName, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MazeFormatError(`cannot open file ${fileName}: ${reason}`);
  }
  return parseMaze(text);
}
