// experiments/experiment-runner.ts
//
// Offline DFS experiments: solves many generated Empty/Random/Maze grids
// and writes a CSV with expansions, peak frontier, path length vs Manhattan
// distance and timings.
//
// Run with:
//   npm run experiments

import { writeFileSync } from "node:fs";
import type { TrialConfig } from "../src/interfaces/interfaces";
import type { MapType } from "../src/types/types";
import { CSV_HEADER, runTrial, toCsvRow } from "../src/experiments/experiment";

// ---------- Experiment parameters ----------
const OUTPUT_CSV = "experiments/results_dfs.csv";

// how many seeds per configuration
const NUM_TRIALS = 50;

// grid sizes (height x width)
const SIZES: [number, number][] = [
  [31, 31],
  [63, 63],
  [63, 127],
];

const MAP_TYPES: MapType[] = ["Maze", "Random", "Empty"];

// densities for Random maps
const DENSITIES = [0.2, 0.35];

// run each config with and without neighbor shuffling
const SHUFFLE = [false, true];

function main() {
  const rows: string[] = [CSV_HEADER];
  let trialIndex = 0;

  for (const [height, width] of SIZES) {
    for (const mapType of MAP_TYPES) {
      for (const density of mapType === "Random" ? DENSITIES : [0]) {
        for (const shuffle of SHUFFLE) {
          for (let t = 0; t < NUM_TRIALS; t++) {
            const config: TrialConfig = {
              height,
              width,
              mapType,
              density,
              seed: 1000 * trialIndex + t,
              shuffle,
            };
            rows.push(toCsvRow(trialIndex, config, runTrial(config)));
          }
          trialIndex++;
          console.log(
            `Done config ${trialIndex} :: ${height}x${width}, map=${mapType}, density=${density}, shuffle=${shuffle}`
          );
        }
      }
    }
  }

  writeFileSync(OUTPUT_CSV, rows.join("\n"), "utf8");
  console.log(`\n✅ Wrote ${rows.length - 1} rows to ${OUTPUT_CSV}`);
}

main();
