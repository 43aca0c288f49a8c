import type { GridModel, SearchResult } from "../interfaces/interfaces";
import { map_color_constants } from "../utils/constants";
import { classifyCells } from "../utils/render/renderText";

export interface MazeViewProps {
  grid: GridModel;
  result: SearchResult | null;
  runtimeMs?: number;
  showExplored?: boolean;
}

export function MazeView({ grid, result, runtimeMs, showExplored = false }: MazeViewProps) {
  const kinds = classifyCells(grid, result, showExplored);
  const rows = Array.from({ length: grid.height }, (_, r) =>
    kinds.slice(r * grid.width, (r + 1) * grid.width)
  );
  const status = result ? (result.solution ? "Found" : "No path") : "Idle";

  return (
    <div className="panel">
      <div className="flex items-center justify-between mb-2">
        <h2 className="font-semibold">DFS</h2>
        <div className="text-xs text-slate-500">{status}</div>
      </div>
      <table className="maze">
        <tbody>
          {rows.map((row, r) => (
            <tr key={r}>
              {row.map((kind, c) => (
                <td key={c} data-kind={kind} style={{ background: map_color_constants[kind] }} />
              ))}
            </tr>
          ))}
        </tbody>
      </table>
      <div className="stats">
        <div className="text-slate-500">Expanded</div><div className="font-mono">{result?.numExplored ?? 0}</div>
        <div className="text-slate-500">Peak frontier</div><div className="font-mono">{result?.peakFrontier ?? 0}</div>
        <div className="text-slate-500">Runtime</div><div className="font-mono">{runtimeMs != null ? runtimeMs.toFixed(1) + " ms" : "—"}</div>
        <div className="text-slate-500">Path length</div><div className="font-mono">{result?.solution ? result.solution.actions.length : "—"}</div>
      </div>
    </div>
  );
}
