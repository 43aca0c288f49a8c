import { EmptyFrontierError } from "../../errors/errors";
import type { SearchNode } from "../../interfaces/interfaces";
import type { Coordinate } from "../../types/types";

// Removal policy is what separates DFS from a queue or priority search.
export interface Frontier {
  push(node: SearchNode): void;
  pop(): SearchNode;
  isEmpty(): boolean;
  containsCoordinate(at: Coordinate): boolean;
  size(): number;
}

const keyOf = (at: Coordinate) => `${at.r},${at.c}`;

// LIFO: push and pop at the tail
export class StackFrontier implements Frontier {
  private a: SearchNode[] = [];
  private queued = new Map<string, number>();

  size() {
    return this.a.length;
  }
  isEmpty() {
    return this.a.length === 0;
  }
  push(node: SearchNode) {
    this.a.push(node);
    const k = keyOf(node.state);
    this.queued.set(k, (this.queued.get(k) ?? 0) + 1);
  }
  pop(): SearchNode {
    const node = this.a.pop();
    if (node === undefined) throw new EmptyFrontierError();
    const k = keyOf(node.state);
    const left = (this.queued.get(k) ?? 1) - 1;
    if (left > 0) this.queued.set(k, left);
    else this.queued.delete(k);
    return node;
  }
  containsCoordinate(at: Coordinate) {
    return this.queued.has(keyOf(at));
  }
  coordinates(): Coordinate[] {
    return this.a.map((n) => n.state);
  }
}
