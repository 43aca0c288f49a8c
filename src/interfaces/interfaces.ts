import type {
  Action,
  Coordinate,
  MapType,
  SearchKey,
  SearchStatus,
} from "../types/types";
import type { Logger } from "../utils/logger/logger";

export interface GridModel {
  height: number;
  width: number;
  blocks: Uint8Array; // row-major, 0 free, 1 wall
  start: Coordinate;
  goal: Coordinate;
}

interface NodeBase {
  index: number; // position in the run's arena
  state: Coordinate;
}

export type RootNode = NodeBase & { parent: null; action: "" };
export type ChildNode = NodeBase & { parent: number; action: Action }; // parent is an arena index

export type SearchNode = RootNode | ChildNode;

export interface Solution {
  actions: Action[];
  cells: Coordinate[]; // starts with the start cell
}

interface ResultBase {
  key: SearchKey;
  explored: Coordinate[]; // in processing order
  numExplored: number;
  peakFrontier: number;
}

export type SearchResult =
  | (ResultBase & { status: "Solved"; solution: Solution })
  | (ResultBase & { status: "Exhausted"; solution: null });

// One expansion, yielded while the search runs (for visualization only)
export interface SearchState {
  key: SearchKey;
  status: SearchStatus;
  current: Coordinate;
  frontier: Coordinate[];
  numExplored: number;
  peakFrontier: number;
}

export interface SolveOptions {
  shuffle?: boolean; // shuffle valid neighbors before pushing
  seed?: number; // used only with shuffle
  logger?: Logger;
}

export interface RunConfig {
  file: string;
  search: SearchKey;
  debug: boolean;
  shuffle: boolean;
  seed: number;
  html: string | null; // write an HTML report here
  showExplored: boolean;
}

export interface TrialConfig {
  height: number;
  width: number;
  mapType: MapType;
  density: number; // for Random
  seed: number;
  shuffle: boolean;
}
