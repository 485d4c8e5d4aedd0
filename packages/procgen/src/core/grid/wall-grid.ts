/**
 * Wall grid for perfect-maze generation.
 * Two flat Uint8Array wall layers, indexed y * width + x.
 */

import { MazeError } from "@mazeworks/contracts";
import {
  DIRECTIONS_4,
  manhattanDistance,
  type Point,
} from "../geometry/types";
import type { ReadonlyWallGrid } from "./types";

const WALL = 1;
const OPEN = 0;

/**
 * Walls between orthogonally adjacent cells of a `width × height` maze.
 *
 * - `vertical[y][x]` separates (x,y) from (x+1,y); the last column is unused
 *   and stays closed (the east border is implicit).
 * - `horizontal[y][x]` separates (x,y) from (x,y+1); the last row is unused.
 *
 * A new grid is fully closed. Generators carve passages through
 * {@link WallGrid.removeWallBetween}.
 */
export class WallGrid implements ReadonlyWallGrid {
  readonly width: number;
  readonly height: number;
  private readonly vertical: Uint8Array;
  private readonly horizontal: Uint8Array;

  /**
   * @throws {MazeError} INVALID_DIMENSION unless both sides are positive integers
   */
  constructor(width: number, height: number) {
    if (
      !Number.isInteger(width) ||
      !Number.isInteger(height) ||
      width <= 0 ||
      height <= 0
    ) {
      throw MazeError.invalidDimension(width, height);
    }

    this.width = width;
    this.height = height;
    this.vertical = new Uint8Array(width * height).fill(WALL);
    this.horizontal = new Uint8Array(width * height).fill(WALL);
  }

  /**
   * Build a grid from row-major boolean wall arrays.
   *
   * Rows or entries missing from the input stay closed; anything beyond
   * `width × height` is ignored.
   */
  static fromWallArrays(
    width: number,
    height: number,
    vertical: readonly (readonly boolean[])[],
    horizontal: readonly (readonly boolean[])[],
  ): WallGrid {
    const grid = new WallGrid(width, height);
    grid.copyLayer(grid.vertical, vertical);
    grid.copyLayer(grid.horizontal, horizontal);
    return grid;
  }

  private copyLayer(
    target: Uint8Array,
    rows: readonly (readonly boolean[])[],
  ): void {
    const rowCount = Math.min(rows.length, this.height);
    for (let y = 0; y < rowCount; y++) {
      const row = rows[y] ?? [];
      const columnCount = Math.min(row.length, this.width);
      for (let x = 0; x < columnCount; x++) {
        target[y * this.width + x] = row[x] ? WALL : OPEN;
      }
    }
  }

  // ===========================================================================
  // BOUNDS CHECKING
  // ===========================================================================

  isInBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  containsPoint(p: Point): boolean {
    return this.isInBounds(p.x, p.y);
  }

  /**
   * Both cells in bounds and sharing an edge
   */
  areAdjacent(a: Point, b: Point): boolean {
    return (
      this.containsPoint(a) &&
      this.containsPoint(b) &&
      manhattanDistance(a, b) === 1
    );
  }

  // ===========================================================================
  // WALL ACCESS
  // ===========================================================================

  /**
   * Out-of-bounds coordinates read as walls.
   */
  hasVerticalWall(x: number, y: number): boolean {
    if (!this.isInBounds(x, y)) return true;
    return this.vertical[y * this.width + x] === WALL;
  }

  hasHorizontalWall(x: number, y: number): boolean {
    if (!this.isInBounds(x, y)) return true;
    return this.horizontal[y * this.width + x] === WALL;
  }

  /**
   * East wall of a cell, the border included.
   */
  hasEastWall(x: number, y: number): boolean {
    if (x === this.width - 1) return true;
    return this.hasVerticalWall(x, y);
  }

  /**
   * South wall of a cell, the border included.
   */
  hasSouthWall(x: number, y: number): boolean {
    if (y === this.height - 1) return true;
    return this.hasHorizontalWall(x, y);
  }

  /**
   * Open the wall shared by two adjacent cells.
   *
   * Equal x means the cells are stacked and the horizontal wall at
   * min(y) is opened; equal y opens the vertical wall at min(x).
   *
   * @throws {MazeError} NOT_ADJACENT if the cells do not share an edge
   */
  removeWallBetween(a: Point, b: Point): void {
    if (!this.areAdjacent(a, b)) {
      throw MazeError.create(
        "NOT_ADJACENT",
        `Cells (${a.x},${a.y}) and (${b.x},${b.y}) do not share an edge`,
        { a, b, width: this.width, height: this.height },
      );
    }

    if (a.x === b.x) {
      this.horizontal[Math.min(a.y, b.y) * this.width + a.x] = OPEN;
    } else {
      this.vertical[a.y * this.width + Math.min(a.x, b.x)] = OPEN;
    }
  }

  /**
   * True when the cells are adjacent and no wall separates them.
   */
  isOpen(a: Point, b: Point): boolean {
    if (!this.areAdjacent(a, b)) return false;
    if (a.x === b.x) {
      return !this.hasHorizontalWall(a.x, Math.min(a.y, b.y));
    }
    return !this.hasVerticalWall(Math.min(a.x, b.x), a.y);
  }

  /**
   * Open every interior wall. Border slots are left untouched.
   */
  openAllInteriorWalls(): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        if (x + 1 < this.width) this.removeWallBetween({ x, y }, { x: x + 1, y });
        if (y + 1 < this.height) this.removeWallBetween({ x, y }, { x, y: y + 1 });
      }
    }
  }

  /**
   * Number of open walls among the defined (interior) slots.
   */
  openPassageCount(): number {
    let count = 0;
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        const index = y * this.width + x;
        if (x + 1 < this.width && this.vertical[index] === OPEN) count++;
        if (y + 1 < this.height && this.horizontal[index] === OPEN) count++;
      }
    }
    return count;
  }

  // ===========================================================================
  // NEIGHBOR OPERATIONS
  // ===========================================================================

  /**
   * In-bounds neighbors in N, E, S, W order.
   *
   * The returned iterable is lazy and can be iterated more than once.
   */
  neighborsInBounds(cell: Point): Iterable<Point> {
    return { [Symbol.iterator]: () => this.neighborIterator(cell) };
  }

  private *neighborIterator(cell: Point): Generator<Point> {
    for (const dir of DIRECTIONS_4) {
      const x = cell.x + dir.x;
      const y = cell.y + dir.y;
      if (this.isInBounds(x, y)) {
        yield { x, y };
      }
    }
  }

  /**
   * Neighbors reachable without crossing a wall, in N, E, S, W order.
   */
  openNeighbors(cell: Point): Point[] {
    const result: Point[] = [];
    for (const neighbor of this.neighborsInBounds(cell)) {
      if (this.isOpen(cell, neighbor)) result.push(neighbor);
    }
    return result;
  }

  // ===========================================================================
  // EXPORT
  // ===========================================================================

  getVerticalWalls(): boolean[][] {
    return this.toRows(this.vertical);
  }

  getHorizontalWalls(): boolean[][] {
    return this.toRows(this.horizontal);
  }

  private toRows(layer: Uint8Array): boolean[][] {
    const rows: boolean[][] = [];
    for (let y = 0; y < this.height; y++) {
      const row: boolean[] = [];
      for (let x = 0; x < this.width; x++) {
        row.push(layer[y * this.width + x] === WALL);
      }
      rows.push(row);
    }
    return rows;
  }

  getRawWallData(): { vertical: Uint8Array; horizontal: Uint8Array } {
    return {
      vertical: new Uint8Array(this.vertical),
      horizontal: new Uint8Array(this.horizontal),
    };
  }

  clone(): WallGrid {
    const copy = new WallGrid(this.width, this.height);
    copy.vertical.set(this.vertical);
    copy.horizontal.set(this.horizontal);
    return copy;
  }

  /**
   * Same dimensions and identical wall bytes, unused slots included.
   */
  equals(other: ReadonlyWallGrid): boolean {
    if (this.width !== other.width || this.height !== other.height) {
      return false;
    }
    const theirs = other.getRawWallData();
    for (let i = 0; i < this.vertical.length; i++) {
      if (this.vertical[i] !== theirs.vertical[i]) return false;
      if (this.horizontal[i] !== theirs.horizontal[i]) return false;
    }
    return true;
  }
}
