import type { RunConfig } from "../interfaces/interfaces";
import { UsageError } from "../errors/errors";

export const DEFAULT_RUN_CONFIG: RunConfig = {
  file: "maze.txt",
  search: "DFS",
  debug: false,
  shuffle: false,
  seed: 1,
  html: null,
  showExplored: false,
};

// Boolean flags take --flag or --flag=true
const isOn = (value: string | undefined) =>
  value === undefined || value === "" || value === "true";

// --key=value arguments, e.g. --file=maze.txt --search=dfs --shuffle --seed=7
export function parseArgs(argv: string[]): RunConfig {
  const config: RunConfig = { ...DEFAULT_RUN_CONFIG };

  for (const arg of argv) {
    if (!arg.startsWith("--")) throw new UsageError(`Unexpected argument: ${arg}`);
    const eq = arg.indexOf("=");
    const key = eq < 0 ? arg.substring(2) : arg.substring(2, eq);
    const value = eq < 0 ? undefined : arg.substring(eq + 1);

    if (key === "file" && value) {
      config.file = value;
    } else if (key === "search" && value) {
      if (value.toLowerCase() !== "dfs") {
        throw new UsageError(`Unknown search type: ${value}`);
      }
      config.search = "DFS";
    } else if (key === "seed" && value) {
      const seed = Number(value);
      if (!Number.isInteger(seed)) throw new UsageError(`Invalid seed: ${value}`);
      config.seed = seed;
    } else if (key === "html" && value) {
      config.html = value;
    } else if (key === "debug") {
      config.debug = isOn(value);
    } else if (key === "shuffle") {
      config.shuffle = isOn(value);
    } else if (key === "explored") {
      config.showExplored = isOn(value);
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  return config;
}
