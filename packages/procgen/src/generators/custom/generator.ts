/**
 * Open grid placeholder.
 *
 * Opens every interior wall. The result is connected but full of loops, so
 * it is flagged as not perfect. Register another generator under "custom"
 * to replace it.
 */

import type { WallGrid } from "../../core/grid";
import type { MazeGenerator } from "../types";

export class OpenGridGenerator implements MazeGenerator {
  readonly id = "custom";
  readonly name = "Open grid";
  readonly description = "Every interior wall removed; not a perfect maze";
  readonly perfect = false;

  carve(grid: WallGrid): void {
    grid.openAllInteriorWalls();
  }
}

export function createOpenGridGenerator(): MazeGenerator {
  return new OpenGridGenerator();
}
