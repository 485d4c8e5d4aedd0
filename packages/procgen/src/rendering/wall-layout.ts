/**
 * Wall layout handed to renderers and collision builders.
 *
 * Coordinates are in cell units: cell (x, y) spans [x, x+1] × [y, y+1].
 * Multiply by the cell size to get world space.
 */

import type { Segment } from "../core/geometry";
import type { CellWalls, ReadonlyWallGrid } from "../core/grid";

/**
 * Forward (east, south) walls of every cell, row-major, borders included.
 */
export function describeCellWalls(grid: ReadonlyWallGrid): CellWalls[] {
  const cells: CellWalls[] = [];
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      cells.push({
        x,
        y,
        east: grid.hasEastWall(x, y),
        south: grid.hasSouthWall(x, y),
      });
    }
  }
  return cells;
}

/**
 * The four border walls (top, right, bottom, left) as full-length segments.
 */
export function borderSegments(grid: ReadonlyWallGrid): Segment[] {
  const { width, height } = grid;
  return [
    { start: { x: 0, y: 0 }, end: { x: width, y: 0 } },
    { start: { x: width, y: 0 }, end: { x: width, y: height } },
    { start: { x: 0, y: height }, end: { x: width, y: height } },
    { start: { x: 0, y: 0 }, end: { x: 0, y: height } },
  ];
}

/**
 * Border segments followed by one unit segment per standing interior wall.
 * Interior walls come row-major, east before south for each cell.
 */
export function collectWallSegments(grid: ReadonlyWallGrid): Segment[] {
  const segments = borderSegments(grid);
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      if (x + 1 < grid.width && grid.hasVerticalWall(x, y)) {
        segments.push({ start: { x: x + 1, y }, end: { x: x + 1, y: y + 1 } });
      }
      if (y + 1 < grid.height && grid.hasHorizontalWall(x, y)) {
        segments.push({ start: { x, y: y + 1 }, end: { x: x + 1, y: y + 1 } });
      }
    }
  }
  return segments;
}
