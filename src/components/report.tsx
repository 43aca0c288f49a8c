import { renderToStaticMarkup } from "react-dom/server";
import type { GridModel, SearchResult } from "../interfaces/interfaces";
import { MazeView } from "./MazeView";

const css = `
body { font-family: system-ui, sans-serif; margin: 2rem; color: #0f172a; }
.maze { border-collapse: collapse; }
.maze td { width: 14px; height: 14px; border: 1px solid #e2e8f0; padding: 0; }
.stats { display: grid; grid-template-columns: auto auto; gap: 0.25rem 1rem; margin-top: 1rem; }
`;

// Standalone HTML page for a solved (or exhausted) maze
export function renderHtmlReport(
  grid: GridModel,
  result: SearchResult | null,
  runtimeMs?: number,
  showExplored = false
) {
  const markup = renderToStaticMarkup(
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>Maze DFS Lab</title>
        <style>{css}</style>
      </head>
      <body>
        <MazeView grid={grid} result={result} runtimeMs={runtimeMs} showExplored={showExplored} />
      </body>
    </html>
  );
  return "<!DOCTYPE html>" + markup;
}
