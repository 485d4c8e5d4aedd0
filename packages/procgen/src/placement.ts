/**
 * Start/goal placement.
 */

import { MazeError } from "@mazeworks/contracts";
import type { Dimensions } from "./core/geometry";
import type { StartGoal } from "./types";

export interface PlacementInput extends Dimensions {
  readonly goalInCenter: boolean;
}

/**
 * Start is always the origin. A centered goal floors toward the lower index,
 * so even-sized mazes get the upper-left of the four middle cells: 16×16
 * puts it at (7,7).
 *
 * @throws {MazeError} INVALID_DIMENSION for non-positive dimensions
 */
export function computeStartGoal(input: PlacementInput): StartGoal {
  const { width, height, goalInCenter } = input;
  if (width <= 0 || height <= 0) {
    throw MazeError.invalidDimension(width, height);
  }

  const goal = goalInCenter
    ? { x: Math.floor((width - 1) / 2), y: Math.floor((height - 1) / 2) }
    : { x: width - 1, y: height - 1 };

  return { start: { x: 0, y: 0 }, goal };
}
