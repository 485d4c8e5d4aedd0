/**
 * Maze persistence.
 *
 * A maze is stored as a JSON record:
 *
 * ```json
 * { "width": 2, "height": 1, "seed": 42, "algorithm": "prim",
 *   "goal_in_center": true,
 *   "vertical_walls": [[false, true]],
 *   "horizontal_walls": [[true, true]] }
 * ```
 *
 * Missing fields take defaults. Wall arrays are checked against the stated
 * dimensions unless the caller opts into clipping.
 */

import {
  Err,
  MAZE_ALGORITHMS,
  type MazeAlgorithm,
  MazeError,
  type MazeFileRecord,
  MazeFileSchema,
  Ok,
  Result,
} from "@mazeworks/contracts";
import { WallGrid } from "../core/grid";
import { computeStartGoal } from "../placement";
import type { MazeResult } from "../types";

const DEV_MODE = process.env.NODE_ENV !== "production";

/**
 * Everything needed to rebuild a maze.
 */
export interface MazeState {
  readonly width: number;
  readonly height: number;
  readonly seed: number;
  readonly algorithm: MazeAlgorithm;
  readonly goalInCenter: boolean;
  readonly verticalWalls: boolean[][];
  readonly horizontalWalls: boolean[][];
}

export interface DeserializeOptions {
  /**
   * Reject wall arrays whose shape differs from `height × width` (default).
   * When false, the arrays are clipped onto a closed grid of the stated size.
   */
  readonly strict?: boolean;
}

export function serializeMaze(state: MazeState): string {
  const record: MazeFileRecord = {
    width: state.width,
    height: state.height,
    seed: state.seed,
    algorithm: state.algorithm,
    goal_in_center: state.goalInCenter,
    vertical_walls: state.verticalWalls,
    horizontal_walls: state.horizontalWalls,
  };
  return JSON.stringify(record);
}

export function deserializeMaze(
  text: string,
  options: DeserializeOptions = {},
): Result<MazeState, MazeError> {
  const strict = options.strict ?? true;

  const json = Result.fromThrowable(
    (): unknown => JSON.parse(text),
    (e) =>
      MazeError.payloadMalformed("Maze payload is not valid JSON", {
        reason: e instanceof Error ? e.message : String(e),
      }),
  );
  if (json.isErr()) return Err(json.error);

  const parsed = MazeFileSchema.safeParse(json.value);
  if (!parsed.success) {
    const issues = parsed.error.issues;
    const dimensionIssue = issues.find(
      (issue) => issue.path[0] === "width" || issue.path[0] === "height",
    );
    if (dimensionIssue) {
      return Err(
        MazeError.create("INVALID_DIMENSION", "Maze payload has invalid dimensions", {
          field: dimensionIssue.path.join("."),
          message: dimensionIssue.message,
        }),
      );
    }
    return Err(
      MazeError.payloadMalformed("Maze payload does not match the maze record", {
        issues: issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      }),
    );
  }

  const record = parsed.data;
  const state: MazeState = {
    width: record.width,
    height: record.height,
    seed: record.seed,
    algorithm: toAlgorithm(record.algorithm),
    goalInCenter: record.goal_in_center,
    verticalWalls: record.vertical_walls,
    horizontalWalls: record.horizontal_walls,
  };

  if (hasShape(state.verticalWalls, state) && hasShape(state.horizontalWalls, state)) {
    return Ok(state);
  }

  if (strict) {
    return Err(
      MazeError.create(
        "PAYLOAD_SHAPE_MISMATCH",
        `Wall arrays do not match ${state.width}x${state.height}`,
        {
          width: state.width,
          height: state.height,
          verticalRows: state.verticalWalls.length,
          horizontalRows: state.horizontalWalls.length,
        },
      ),
    );
  }

  if (DEV_MODE) {
    console.warn(
      `[MazeFile] Wall arrays do not match ${state.width}x${state.height}; clipping onto a closed grid`,
    );
  }
  const grid = WallGrid.fromWallArrays(
    state.width,
    state.height,
    state.verticalWalls,
    state.horizontalWalls,
  );
  return Ok({
    ...state,
    verticalWalls: grid.getVerticalWalls(),
    horizontalWalls: grid.getHorizontalWalls(),
  });
}

function toAlgorithm(value: MazeAlgorithm | number): MazeAlgorithm {
  if (typeof value !== "number") return value;
  return MAZE_ALGORITHMS[value] ?? "prim";
}

function hasShape(rows: readonly (readonly boolean[])[], size: MazeState): boolean {
  return (
    rows.length === size.height && rows.every((row) => row.length === size.width)
  );
}

export function mazeStateFromResult(maze: MazeResult): MazeState {
  return {
    width: maze.grid.width,
    height: maze.grid.height,
    seed: maze.seed,
    algorithm: maze.config.algorithm,
    goalInCenter: maze.config.goalInCenter,
    verticalWalls: maze.grid.getVerticalWalls(),
    horizontalWalls: maze.grid.getHorizontalWalls(),
  };
}

/**
 * Rebuild a maze from a loaded state. Start and goal are recomputed from the
 * dimensions and `goalInCenter`.
 */
export function mazeResultFromState(state: MazeState): Result<MazeResult, MazeError> {
  return Result.fromThrowable(
    () => {
      const grid = WallGrid.fromWallArrays(
        state.width,
        state.height,
        state.verticalWalls,
        state.horizontalWalls,
      );
      const { start, goal } = computeStartGoal(state);
      return {
        config: {
          width: state.width,
          height: state.height,
          seed: state.seed,
          algorithm: state.algorithm,
          goalInCenter: state.goalInCenter,
        },
        seed: state.seed,
        grid,
        start,
        goal,
      };
    },
    (e) =>
      MazeError.isMazeError(e)
        ? e
        : MazeError.payloadMalformed("Could not rebuild maze", {
            reason: e instanceof Error ? e.message : String(e),
          }),
  );
}
