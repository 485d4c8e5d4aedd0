/**
 * Cell <-> world-space mapping for collaborators that place markers,
 * robots or colliders on top of a maze.
 */

import { MazeError } from "@mazeworks/contracts";
import type { Point, WorldPosition } from "./core/geometry";
import type { MazeResult } from "./types";

function assertCellSize(cellSize: number): void {
  if (!(cellSize > 0) || !Number.isFinite(cellSize)) {
    throw MazeError.configInvalid("Cell size must be a positive finite number", {
      cellSize,
    });
  }
}

/**
 * Center of a cell in world units.
 * @throws {MazeError} CONFIG_INVALID for a non-positive cell size
 */
export function cellToWorld(cell: Point, cellSize: number): WorldPosition {
  assertCellSize(cellSize);
  return { x: (cell.x + 0.5) * cellSize, y: (cell.y + 0.5) * cellSize };
}

/**
 * Cell whose square contains the position. No bounds check.
 * @throws {MazeError} CONFIG_INVALID for a non-positive cell size
 */
export function worldToCell(position: WorldPosition, cellSize: number): Point {
  assertCellSize(cellSize);
  return {
    x: Math.floor(position.x / cellSize),
    y: Math.floor(position.y / cellSize),
  };
}

export function startWorldPosition(maze: MazeResult, cellSize: number): WorldPosition {
  return cellToWorld(maze.start, cellSize);
}

export function goalWorldPosition(maze: MazeResult, cellSize: number): WorldPosition {
  return cellToWorld(maze.goal, cellSize);
}

/**
 * Cell of the maze containing a world position, or undefined outside it.
 */
export function cellContaining(
  maze: MazeResult,
  position: WorldPosition,
  cellSize: number,
): Point | undefined {
  const cell = worldToCell(position, cellSize);
  return maze.grid.containsPoint(cell) ? cell : undefined;
}
