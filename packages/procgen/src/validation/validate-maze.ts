import { calculateBFSDistances } from "../core/graph";
import type { ReadonlyWallGrid } from "../core/grid";

export interface MazeViolation {
  readonly type: "maze.passages" | "maze.connectivity";
  readonly message: string;
  readonly severity: "error";
}

export interface MazeValidationResult {
  /** Open passages form a spanning tree of the grid. */
  readonly perfect: boolean;
  readonly openPassages: number;
  readonly expectedPassages: number;
  readonly reachableCells: number;
  readonly totalCells: number;
  readonly violations: readonly MazeViolation[];
}

/**
 * Check the perfect-maze invariant: every cell reachable from (0,0) and
 * exactly `cells - 1` open passages. Together these rule out cycles.
 */
export function validateMaze(grid: ReadonlyWallGrid): MazeValidationResult {
  const { width } = grid;
  const totalCells = width * grid.height;
  const expectedPassages = totalCells - 1;
  const openPassages = grid.openPassageCount();

  const { distances } = calculateBFSDistances(0, (id) =>
    grid
      .openNeighbors({ x: id % width, y: Math.floor(id / width) })
      .map((cell) => cell.y * width + cell.x),
  );
  const reachableCells = distances.size;

  const violations: MazeViolation[] = [];
  if (openPassages !== expectedPassages) {
    violations.push({
      type: "maze.passages",
      message: `Expected ${expectedPassages} open passages, found ${openPassages}`,
      severity: "error",
    });
  }
  if (reachableCells !== totalCells) {
    violations.push({
      type: "maze.connectivity",
      message: `Only ${reachableCells} of ${totalCells} cells reachable from (0,0)`,
      severity: "error",
    });
  }

  return {
    perfect: violations.length === 0,
    openPassages,
    expectedPassages,
    reachableCells,
    totalCells,
    violations,
  };
}
