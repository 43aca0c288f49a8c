import type {
  GridModel,
  SearchNode,
  SearchResult,
  SearchState,
  Solution,
  SolveOptions,
} from "../interfaces/interfaces";
import type { Action, Coordinate, SearchStatus } from "../types/types";
import { ExploredSet } from "../utils/explored/ExploredSet";
import { StackFrontier } from "../utils/frontier/StackFrontier";
import { silentLogger } from "../utils/logger/logger";
import {
  neighbors,
  rngLCG,
  sameCell,
  shuffleInPlace,
  validateGrid,
} from "../utils/utils";

const fmt = (at: Coordinate) => `(${at.r},${at.c})`;

// Follow parent indexes from the goal back to the root, then flip to start -> goal
export function reconstructSolution(nodes: SearchNode[], goal: number): Solution {
  const actions: Action[] = [];
  const cells: Coordinate[] = [];
  let cur = nodes[goal];
  while (cur.parent !== null) {
    actions.push(cur.action);
    cells.push(cur.state);
    cur = nodes[cur.parent];
  }
  cells.push(cur.state);
  return { actions: actions.reverse(), cells: cells.reverse() };
}

// Yields one expansion per step; on completion returns the SearchResult.
export function* algoDFS(
  grid: GridModel,
  options: SolveOptions = {}
): Generator<SearchState, SearchResult, void> {
  validateGrid(grid);
  const { shuffle = false, seed = 1, logger = silentLogger } = options;
  const rng = shuffle ? rngLCG(seed) : null;

  const nodes: SearchNode[] = [];
  const frontier = new StackFrontier();
  const explored = new ExploredSet();
  const meta = { numExplored: 0, peakFrontier: 1 };

  const root: SearchNode = { index: 0, state: grid.start, parent: null, action: "" };
  nodes.push(root);
  frontier.push(root);
  logger.debug(`DFS from ${fmt(grid.start)} to ${fmt(grid.goal)}`);

  while (!frontier.isEmpty()) {
    meta.peakFrontier = Math.max(meta.peakFrontier, frontier.size());
    if (logger.verbose) {
      logger.debug(`frontier: ${frontier.coordinates().map(fmt).join(" ")}`);
    }
    const current = frontier.pop();
    meta.numExplored++;
    logger.debug(`removed ${fmt(current.state)}`);

    yield {
      key: "DFS",
      status: "Running",
      current: current.state,
      frontier: frontier.coordinates(),
      numExplored: meta.numExplored,
      peakFrontier: meta.peakFrontier,
    };

    if (sameCell(current.state, grid.goal)) {
      const solution = reconstructSolution(nodes, current.index);
      explored.markExplored(current.state);
      logger.debug(`goal reached after ${meta.numExplored} expansions`);
      return {
        key: "DFS",
        status: "Solved",
        solution,
        explored: explored.toArray(),
        numExplored: meta.numExplored,
        peakFrontier: meta.peakFrontier,
      };
    }
    explored.markExplored(current.state);

    const next = neighbors(grid, current.state);
    if (rng) shuffleInPlace(next, rng);
    for (const { at, action } of next) {
      if (frontier.containsCoordinate(at) || explored.isExplored(at)) continue;
      const child: SearchNode = {
        index: nodes.length,
        state: at,
        parent: current.index,
        action,
      };
      nodes.push(child);
      frontier.push(child);
    }
  }

  logger.debug(`frontier exhausted after ${meta.numExplored} expansions`);
  return {
    key: "DFS",
    status: "Exhausted",
    solution: null,
    explored: explored.toArray(),
    numExplored: meta.numExplored,
    peakFrontier: meta.peakFrontier,
  };
}

export class DepthFirstSearch {
  status: SearchStatus = "Ready";
  result: SearchResult | null = null;

  constructor(
    readonly grid: GridModel,
    private readonly options: SolveOptions = {}
  ) {}

  // Step-by-step run; each call starts from a fresh frontier and explored set.
  *steps(): Generator<SearchState, SearchResult, void> {
    const run = algoDFS(this.grid, this.options);
    let it = run.next(); // an invalid grid throws here, before the status moves
    this.status = "Running";
    this.result = null;
    while (!it.done) {
      yield it.value;
      it = run.next();
    }
    this.status = it.value.status;
    this.result = it.value;
    return it.value;
  }

  solve(): SearchResult {
    const gen = this.steps();
    let it = gen.next();
    while (!it.done) it = gen.next();
    return it.value;
  }

  get explored(): Coordinate[] {
    return this.result ? this.result.explored : [];
  }

  get numExplored(): number {
    return this.result ? this.result.numExplored : 0;
  }
}

export const solveDFS = (grid: GridModel, options: SolveOptions = {}) =>
  new DepthFirstSearch(grid, options).solve();
