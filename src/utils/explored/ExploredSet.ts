import type { Coordinate } from "../../types/types";

export class ExploredSet {
  private seen = new Set<string>();
  private readonly order: Coordinate[] = [];

  markExplored(at: Coordinate) {
    const k = `${at.r},${at.c}`;
    if (this.seen.has(k)) return;
    this.seen.add(k);
    this.order.push(at);
  }
  isExplored(at: Coordinate) {
    return this.seen.has(`${at.r},${at.c}`);
  }
  size() {
    return this.order.length;
  }
  // insertion order, for rendering
  toArray(): Coordinate[] {
    return [...this.order];
  }
}
