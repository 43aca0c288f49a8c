import { describe, it, expect } from 'vitest';
import { buildMap, CSV_HEADER, runTrial, toCsvRow } from '../../experiments/experiment';
import type { TrialConfig } from '../../interfaces/interfaces';

const EMPTY_5: TrialConfig = { height: 5, width: 5, mapType: 'Empty', density: 0, seed: 1, shuffle: false };

describe('experiments', () => {
  it('should run DFS on an empty grid down then across', () => {
    const result = runTrial(EMPTY_5);

    expect(result.found).toBe(true);
    expect(result.manhattan).toBe(8);
    expect(result.pathLength).toBe(8);
    expect(result.nodesExpanded).toBe(9);
  });

  it('should place maze corners on open cells', () => {
    const grid = buildMap({ ...EMPTY_5, height: 9, width: 9, mapType: 'Maze', seed: 4 });
    expect(grid.start).toEqual({ r: 1, c: 1 });
    expect(grid.goal).toEqual({ r: 7, c: 7 });
    expect(runTrial({ ...EMPTY_5, height: 9, width: 9, mapType: 'Maze', seed: 4 }).found).toBe(true);
  });

  it('should write one CSV field per header column', () => {
    const row = toCsvRow(3, EMPTY_5, runTrial(EMPTY_5)).split(',');

    expect(CSV_HEADER.split(',')).toHaveLength(13);
    expect(row).toHaveLength(13);
    expect(row.slice(0, 7)).toEqual(['3', '5', '5', 'Empty', '0', '1', '0']);
    expect(row.slice(8)).toEqual(['9', '7', '8', '8', '1']);
  });
});
