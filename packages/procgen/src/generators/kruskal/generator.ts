/**
 * Kruskal's Maze Generator
 *
 * Shuffles every interior wall and opens those joining two cells that are
 * not yet connected. Union-find rejects walls that would close a loop.
 */

import type { Rng } from "@mazeworks/contracts";
import { UnionFind } from "../../core/algorithms";
import type { WallGrid } from "../../core/grid";
import type { MazeGenerator } from "../types";
import { enumerateWallEdges } from "./edges";

export class KruskalGenerator implements MazeGenerator {
  readonly id = "kruskal";
  readonly name = "Kruskal";
  readonly description =
    "Random edge order over a union-find forest; even texture with many short dead ends";
  readonly perfect = true;

  carve(grid: WallGrid, rng: Rng): void {
    const { width, height } = grid;
    const sets = new UnionFind(width * height);
    const edges = rng.shuffle(enumerateWallEdges(width, height));

    for (const { a, b } of edges) {
      if (sets.union(a.y * width + a.x, b.y * width + b.x)) {
        grid.removeWallBetween(a, b);
      }
    }
  }
}

export function createKruskalGenerator(): MazeGenerator {
  return new KruskalGenerator();
}
