/**
 * Wall grid types.
 */

import type { Point } from "../geometry/types";

/**
 * Forward walls of one cell, as handed to renderers and collision builders.
 * `east` and `south` include the maze border on the last column/row.
 */
export interface CellWalls {
  readonly x: number;
  readonly y: number;
  readonly east: boolean;
  readonly south: boolean;
}

/**
 * Read-only view of a wall grid.
 *
 * Generation results expose this type: once carving is done the maze is
 * replaced wholesale, never edited.
 */
export interface ReadonlyWallGrid {
  readonly width: number;
  readonly height: number;

  isInBounds(x: number, y: number): boolean;
  containsPoint(p: Point): boolean;

  /** Raw entry of the wall between (x,y) and (x+1,y). */
  hasVerticalWall(x: number, y: number): boolean;
  /** Raw entry of the wall between (x,y) and (x,y+1). */
  hasHorizontalWall(x: number, y: number): boolean;
  hasEastWall(x: number, y: number): boolean;
  hasSouthWall(x: number, y: number): boolean;

  isOpen(a: Point, b: Point): boolean;
  neighborsInBounds(cell: Point): Iterable<Point>;
  openNeighbors(cell: Point): Point[];
  openPassageCount(): number;

  getVerticalWalls(): boolean[][];
  getHorizontalWalls(): boolean[][];
  /** Copies of the flat wall arrays, row-major, 1 = wall. */
  getRawWallData(): { vertical: Uint8Array; horizontal: Uint8Array };

  equals(other: ReadonlyWallGrid): boolean;
}
