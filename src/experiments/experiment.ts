import { performance } from "node:perf_hooks";
import { solveDFS } from "../algorithms/DFS";
import type { GridModel, TrialConfig } from "../interfaces/interfaces";
import {
  buildGrid,
  generateEmpty,
  generateMaze,
  generateRandom,
  pickCorners,
} from "../utils/mapGen/mapGen";
import { manhattan } from "../utils/utils";

export interface TrialResult {
  found: boolean;
  pathLength: number | null;
  manhattan: number;
  nodesExpanded: number;
  peakFrontier: number;
  runtimeMs: number;
}

// ---------- Build one map config ----------
export function buildMap(config: TrialConfig): GridModel {
  const { height, width, mapType, density, seed } = config;
  const start = { r: 0, c: 0 };
  const goal = { r: height - 1, c: width - 1 };

  if (mapType === "Empty") {
    return buildGrid(height, width, generateEmpty(height, width), start, goal);
  }
  if (mapType === "Random") {
    const blocks = generateRandom(height, width, density, seed, start, goal);
    return buildGrid(height, width, blocks, start, goal);
  }
  const blocks = generateMaze(height, width, seed);
  const corners = pickCorners(height, width, blocks);
  return buildGrid(height, width, blocks, corners.start, corners.goal);
}

export function runTrial(config: TrialConfig): TrialResult {
  const grid = buildMap(config);
  const begin = performance.now();
  const result = solveDFS(grid, { shuffle: config.shuffle, seed: config.seed });
  return {
    found: result.solution !== null,
    pathLength: result.solution ? result.solution.actions.length : null,
    manhattan: manhattan(grid.start, grid.goal),
    nodesExpanded: result.numExplored,
    peakFrontier: result.peakFrontier,
    runtimeMs: performance.now() - begin,
  };
}

export const CSV_HEADER = [
  "trial",
  "height",
  "width",
  "mapType",
  "density",
  "seed",
  "shuffle",
  "runtimeMs",
  "nodesExpanded",
  "peakFrontier",
  "pathLength",
  "manhattan",
  "found",
].join(",");

export function toCsvRow(trial: number, config: TrialConfig, r: TrialResult) {
  return [
    trial.toString(),
    config.height.toString(),
    config.width.toString(),
    config.mapType,
    config.density.toString(),
    config.seed.toString(),
    config.shuffle ? "1" : "0",
    r.runtimeMs.toFixed(4),
    r.nodesExpanded.toString(),
    r.peakFrontier.toString(),
    r.pathLength == null ? "" : r.pathLength.toString(),
    r.manhattan.toString(),
    r.found ? "1" : "0",
  ].join(",");
}
