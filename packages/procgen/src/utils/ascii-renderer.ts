/**
 * ASCII Maze Renderer
 *
 * Renders mazes as text for debugging and terminal previews.
 *
 * @example
 * ```typescript
 * const maze = generateMaze({ width: 3, height: 2, seed: 1 }).getOrThrow();
 * console.log(renderAscii(maze));
 * // +---+---+---+
 * // | S         |
 * // ...
 * ```
 */

import type { Point } from "../core/geometry";
import type { ReadonlyWallGrid } from "../core/grid";

/**
 * Characters used to draw a maze. `horizontal` and `open` are repeated to
 * the cell width.
 */
export interface AsciiCharset {
  readonly corner: string;
  readonly horizontal: string;
  readonly vertical: string;
  readonly open: string;
  readonly start: string;
  readonly goal: string;
  readonly path: string;
}

export const DEFAULT_CHARSET: AsciiCharset = {
  corner: "+",
  horizontal: "-",
  vertical: "|",
  open: " ",
  start: "S",
  goal: "G",
  path: ".",
};

export interface RenderOptions {
  readonly charset?: AsciiCharset;
  /** Draw start/goal markers (default true) */
  readonly showMarkers?: boolean;
  /** Cells to mark as a route, e.g. the output of solveMaze */
  readonly path?: readonly Point[];
}

export interface RenderableMaze {
  readonly grid: ReadonlyWallGrid;
  readonly start?: Point;
  readonly goal?: Point;
}

const CELL_WIDTH = 3;

/**
 * Render a maze as ASCII art. Each cell is three characters wide.
 */
export function renderAscii(
  maze: RenderableMaze,
  options: RenderOptions = {},
): string {
  const { charset = DEFAULT_CHARSET, showMarkers = true, path = [] } = options;
  const { grid } = maze;

  const onPath = new Set(path.map((p) => p.y * grid.width + p.x));
  const wallRun = charset.horizontal.repeat(CELL_WIDTH);
  const openRun = charset.open.repeat(CELL_WIDTH);

  const contentAt = (x: number, y: number): string => {
    if (showMarkers && maze.start && maze.start.x === x && maze.start.y === y) {
      return charset.start;
    }
    if (showMarkers && maze.goal && maze.goal.x === x && maze.goal.y === y) {
      return charset.goal;
    }
    if (onPath.has(y * grid.width + x)) return charset.path;
    return charset.open;
  };

  const lines: string[] = [
    charset.corner + `${wallRun}${charset.corner}`.repeat(grid.width),
  ];

  for (let y = 0; y < grid.height; y++) {
    let row = charset.vertical;
    let below = charset.corner;
    for (let x = 0; x < grid.width; x++) {
      row += charset.open + contentAt(x, y) + charset.open;
      row += grid.hasEastWall(x, y) ? charset.vertical : charset.open;
      below += (grid.hasSouthWall(x, y) ? wallRun : openRun) + charset.corner;
    }
    lines.push(row, below);
  }

  return lines.join("\n");
}

/**
 * Print a maze to the console
 */
export function printMaze(maze: RenderableMaze, options?: RenderOptions): void {
  console.log(renderAscii(maze, options));
}
