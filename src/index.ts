export { algoDFS, DepthFirstSearch, reconstructSolution, solveDFS } from "./algorithms/DFS";
export { MazeView } from "./components/MazeView";
export { renderHtmlReport } from "./components/report";
export {
  EmptyFrontierError,
  InvalidGridError,
  MazeFormatError,
  UsageError,
} from "./errors/errors";
export type * from "./interfaces/interfaces";
export type * from "./types/types";
export { ExploredSet } from "./utils/explored/ExploredSet";
export { StackFrontier, type Frontier } from "./utils/frontier/StackFrontier";
export { createLogger, silentLogger, type Logger } from "./utils/logger/logger";
export { buildGrid, generateEmpty, generateMaze, generateRandom, pickCorners } from "./utils/mapGen/mapGen";
export { loadMaze, parseMaze } from "./utils/mazeFile/parseMaze";
export { classifyCells, renderText, type CellKind } from "./utils/render/renderText";
export { manhattan, neighbors, rngLCG, shuffleInPlace, step, validateGrid } from "./utils/utils";
