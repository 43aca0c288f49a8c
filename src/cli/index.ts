import { writeFile } from "node:fs/promises";
import { performance } from "node:perf_hooks";
import { solveDFS } from "../algorithms/DFS";
import { renderHtmlReport } from "../components/report";
import { InvalidGridError, MazeFormatError, UsageError } from "../errors/errors";
import { createLogger } from "../utils/logger/logger";
import { loadMaze } from "../utils/mazeFile/parseMaze";
import { renderText } from "../utils/render/renderText";
import { parseArgs } from "./args";

async function main() {
  const config = parseArgs(process.argv.slice(2));
  const logger = createLogger(config.debug);

  const grid = await loadMaze(config.file);
  logger.info(`Goal is (${grid.goal.r},${grid.goal.c})`);
  logger.info("Starting to solve maze with Depth First Search");

  const begin = performance.now();
  const result = solveDFS(grid, {
    shuffle: config.shuffle,
    seed: config.seed,
    logger,
  });
  const runtimeMs = performance.now() - begin;

  if (result.solution) {
    logger.info("Solution: ");
    logger.info(renderText(grid, result, config.showExplored));
    logger.info(`Solution is ${result.solution.actions.length} steps.`);
    logger.info(`Time to solve: ${runtimeMs.toFixed(3)} ms`);
  } else {
    logger.info("No solution found");
  }
  logger.info(`Explored ${result.explored.length} nodes`);

  if (config.html) {
    await writeFile(config.html, renderHtmlReport(grid, result, runtimeMs, config.showExplored), "utf8");
    logger.info(`Wrote report to ${config.html}`);
  }
}

main().catch((err: unknown) => {
  if (
    err instanceof UsageError ||
    err instanceof MazeFormatError ||
    err instanceof InvalidGridError
  ) {
    console.error(err.message);
  } else {
    console.error(err);
  }
  process.exit(1);
});
