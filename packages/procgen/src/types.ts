/**
 * Maze result types.
 */

import type { MazeConfig } from "@mazeworks/contracts";
import type { Point } from "./core/geometry";
import type { ReadonlyWallGrid } from "./core/grid";

/**
 * Output of one generation (or one load).
 *
 * Never edited after creation; regenerate or reload to replace it.
 */
export interface MazeResult {
  readonly config: MazeConfig;
  /** Seed the RNG was built from. Differs from `config.seed` only when that was 0. */
  readonly seed: number;
  readonly grid: ReadonlyWallGrid;
  readonly start: Point;
  readonly goal: Point;
}

/**
 * Start and goal cells of a maze.
 */
export interface StartGoal {
  readonly start: Point;
  readonly goal: Point;
}
