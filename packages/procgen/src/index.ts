/**
 * Maze generation package
 *
 * Deterministic perfect-maze generation over a wall grid.
 *
 * @example
 * ```typescript
 * import { generateMaze, renderAscii } from "@mazeworks/procgen";
 *
 * const result = generateMaze({ width: 16, height: 16, seed: 42, algorithm: "prim" });
 * if (result.success) {
 *   console.log(renderAscii(result.value));
 * }
 * ```
 */

// Core modules
export * from "./core";
// Generators
export * from "./generators";
// High-level API
export {
  createMazeRng,
  type GenerateOptions,
  generate,
  generateMaze,
  getAvailableAlgorithms,
  getGenerator,
  registerGenerator,
} from "./api";
export {
  MazeController,
  type MazeControllerOptions,
} from "./maze-controller";
export { computeStartGoal, type PlacementInput } from "./placement";
// Rendering contract
export {
  borderSegments,
  collectWallSegments,
  describeCellWalls,
} from "./rendering/wall-layout";
// Persistence
export * from "./serialization";
export {
  assertDeterministic,
  DeterminismViolationError,
  testDeterminism,
} from "./testing";
export type { MazeResult, StartGoal } from "./types";
// Utilities
export * from "./utils";
export * from "./validation";
export {
  cellContaining,
  cellToWorld,
  goalWorldPosition,
  startWorldPosition,
  worldToCell,
} from "./world";
