/**
 * Shortest paths through the open passages of a wall grid.
 */

import type { Point } from "../geometry";
import type { ReadonlyWallGrid } from "../grid";

/**
 * Breadth-first shortest path from `from` to `to`, both ends included.
 * Ties are broken by N, E, S, W neighbor order.
 *
 * @returns The path, or undefined when `to` cannot be reached
 */
export function findPath(
  grid: ReadonlyWallGrid,
  from: Point,
  to: Point,
): Point[] | undefined {
  if (!grid.containsPoint(from) || !grid.containsPoint(to)) return undefined;

  const { width } = grid;
  const cellCount = width * grid.height;
  const parent = new Int32Array(cellCount).fill(-1);
  const fromId = from.y * width + from.x;
  const toId = to.y * width + to.x;
  parent[fromId] = fromId;

  const queue: Point[] = [from];
  let head = 0;
  while (head < queue.length) {
    const cell = queue[head++];
    if (!cell) break;
    const cellId = cell.y * width + cell.x;
    if (cellId === toId) break;

    for (const next of grid.openNeighbors(cell)) {
      const nextId = next.y * width + next.x;
      if (parent[nextId] !== -1) continue;
      parent[nextId] = cellId;
      queue.push(next);
    }
  }

  if (parent[toId] === -1) return undefined;

  const path: Point[] = [];
  let id = toId;
  while (id !== fromId) {
    path.push({ x: id % width, y: Math.floor(id / width) });
    id = parent[id] ?? fromId;
  }
  path.push({ x: from.x, y: from.y });
  return path.reverse();
}

/**
 * Shortest route from a maze's start to its goal.
 */
export function solveMaze(maze: {
  readonly grid: ReadonlyWallGrid;
  readonly start: Point;
  readonly goal: Point;
}): Point[] | undefined {
  return findPath(maze.grid, maze.start, maze.goal);
}
