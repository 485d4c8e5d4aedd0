import type { Point } from "../../core/geometry";

/**
 * A potential passage between two adjacent cells.
 * `b` is always the right or lower neighbor of `a`.
 */
export interface WallEdge {
  readonly a: Point;
  readonly b: Point;
}

/**
 * Every interior wall exactly once, row-major, right neighbor before down
 * neighbor. Length is `2wh - w - h`.
 */
export function enumerateWallEdges(width: number, height: number): WallEdge[] {
  const edges: WallEdge[] = [];
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (x + 1 < width) {
        edges.push({ a: { x, y }, b: { x: x + 1, y } });
      }
      if (y + 1 < height) {
        edges.push({ a: { x, y }, b: { x, y: y + 1 } });
      }
    }
  }
  return edges;
}

export function expectedEdgeCount(width: number, height: number): number {
  return 2 * width * height - width - height;
}
