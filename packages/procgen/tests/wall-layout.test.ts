import { describe, expect, it } from "vitest";
import { generateMaze } from "../src/api";
import { WallGrid } from "../src/core/grid";
import {
  borderSegments,
  collectWallSegments,
  describeCellWalls,
} from "../src/rendering/wall-layout";

describe("describeCellWalls", () => {
  it("reports east and south walls row-major", () => {
    const grid = new WallGrid(2, 2);
    grid.removeWallBetween({ x: 0, y: 0 }, { x: 1, y: 0 });
    grid.removeWallBetween({ x: 1, y: 0 }, { x: 1, y: 1 });

    expect(describeCellWalls(grid)).toEqual([
      { x: 0, y: 0, east: false, south: true },
      { x: 1, y: 0, east: true, south: false },
      { x: 0, y: 1, east: true, south: true },
      { x: 1, y: 1, east: true, south: true },
    ]);
  });
});

describe("borderSegments", () => {
  it("returns top, right, bottom and left", () => {
    expect(borderSegments(new WallGrid(3, 2))).toEqual([
      { start: { x: 0, y: 0 }, end: { x: 3, y: 0 } },
      { start: { x: 3, y: 0 }, end: { x: 3, y: 2 } },
      { start: { x: 0, y: 2 }, end: { x: 3, y: 2 } },
      { start: { x: 0, y: 0 }, end: { x: 0, y: 2 } },
    ]);
  });
});

describe("collectWallSegments", () => {
  it("adds one unit segment per standing interior wall", () => {
    const grid = new WallGrid(2, 2);
    grid.removeWallBetween({ x: 0, y: 0 }, { x: 0, y: 1 });

    expect(collectWallSegments(grid).slice(4)).toEqual([
      { start: { x: 1, y: 0 }, end: { x: 1, y: 1 } },
      { start: { x: 1, y: 1 }, end: { x: 2, y: 1 } },
      { start: { x: 1, y: 1 }, end: { x: 1, y: 2 } },
    ]);
  });

  it("has only the border for an open grid", () => {
    const grid = new WallGrid(3, 3);
    grid.openAllInteriorWalls();
    expect(collectWallSegments(grid)).toHaveLength(4);
  });

  it("leaves (w-1)(h-1) interior walls standing in a perfect maze", () => {
    const maze = generateMaze({ width: 8, height: 8, seed: 21 }).getOrThrow();
    expect(collectWallSegments(maze.grid)).toHaveLength(4 + 49);
  });
});
