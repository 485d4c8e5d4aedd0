/**
 * Core geometry types.
 * All types are immutable value objects.
 */

/**
 * 2D point with integer coordinates (a maze cell)
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Continuous position in world space
 */
export interface WorldPosition {
  readonly x: number;
  readonly y: number;
}

/**
 * Line segment between two points
 */
export interface Segment {
  readonly start: Point;
  readonly end: Point;
}

/**
 * Grid dimensions
 */
export interface Dimensions {
  readonly width: number;
  readonly height: number;
}

/**
 * Direction vectors for neighbor enumeration.
 * Order is fixed (N, E, S, W): seeded generators consume randomness in
 * this order, so reordering changes every maze.
 */
export const DIRECTIONS_4 = [
  { x: 0, y: -1 }, // North
  { x: 1, y: 0 }, // East
  { x: 0, y: 1 }, // South
  { x: -1, y: 0 }, // West
] as const;

export type Direction4 = (typeof DIRECTIONS_4)[number];

export function pointsEqual(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

export function manhattanDistance(a: Point, b: Point): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}
