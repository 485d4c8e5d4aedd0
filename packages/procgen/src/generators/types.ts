/**
 * Generator contract.
 */

import type { MazeAlgorithm, Rng } from "@mazeworks/contracts";
import type { WallGrid } from "../core/grid";

/**
 * A carving strategy. It receives a fully closed grid and the caller's RNG,
 * and opens walls only through `grid.removeWallBetween`.
 */
export interface MazeGenerator {
  readonly id: MazeAlgorithm;
  readonly name: string;
  readonly description: string;
  /** Whether the output is a spanning tree (connected, acyclic). */
  readonly perfect: boolean;
  carve(grid: WallGrid, rng: Rng): void;
}
