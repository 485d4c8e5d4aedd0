/**
 * Randomized Prim's Maze Generator
 *
 * Grows the maze from a random cell. The next frontier entry is picked
 * uniformly at random by index, which yields short, branchy passages.
 */

import type { Rng } from "@mazeworks/contracts";
import type { Point } from "../../core/geometry";
import type { WallGrid } from "../../core/grid";
import type { MazeGenerator } from "../types";

interface FrontierEntry {
  readonly cell: Point;
  /** Cell that discovered this one; null for the start cell. */
  readonly from: Point | null;
}

export class PrimGenerator implements MazeGenerator {
  readonly id = "prim";
  readonly name = "Randomized Prim";
  readonly description =
    "Frontier expansion with uniform random picks; short corridors and many branches";
  readonly perfect = true;

  carve(grid: WallGrid, rng: Rng): void {
    const { width, height } = grid;
    const visited = new Uint8Array(width * height);

    const start: Point = {
      x: rng.range(0, width - 1),
      y: rng.range(0, height - 1),
    };
    visited[start.y * width + start.x] = 1;

    const frontier: FrontierEntry[] = [{ cell: start, from: null }];

    while (frontier.length > 0) {
      const index = rng.range(0, frontier.length - 1);
      const [entry] = frontier.splice(index, 1);
      if (!entry) break;

      if (entry.from) {
        grid.removeWallBetween(entry.from, entry.cell);
      }

      // Mark on push so no cell is queued twice
      for (const neighbor of grid.neighborsInBounds(entry.cell)) {
        const id = neighbor.y * width + neighbor.x;
        if (visited[id]) continue;
        visited[id] = 1;
        frontier.push({ cell: neighbor, from: entry.cell });
      }
    }
  }
}

export function createPrimGenerator(): MazeGenerator {
  return new PrimGenerator();
}
