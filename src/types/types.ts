export type Coordinate = Readonly<{ r: number; c: number }>;

export type Action = "up" | "down" | "left" | "right";

export type Cell = { at: Coordinate; blocked: boolean };

export type MapType = "Empty" | "Random" | "Maze";

export type SearchKey = "DFS";

export type SearchStatus = "Ready" | "Running" | "Solved" | "Exhausted";
