import { MazeConfigSchema, MazeEnvSchema } from "../schemas/maze";
import { MazeError } from "../types/error";
import type { MazeConfig } from "../types/maze";
import { Err, Ok, type Result } from "../types/result";

export const MAZE_DEFAULTS = {
  width: 16,
  height: 16,
  seed: 0,
  algorithm: "prim",
  goalInCenter: true,
  /** World units per cell edge. */
  cellSize: 1,
} as const;

export type BuildMazeConfigInput = Partial<MazeConfig>;

/**
 * Validate a complete config.
 *
 * Width/height problems are reported as INVALID_DIMENSION so callers can
 * tell them apart from other config mistakes.
 */
export function validateMazeConfig(
  config: MazeConfig,
): Result<MazeConfig, MazeError> {
  const parsed = MazeConfigSchema.safeParse(config);
  if (parsed.success) return Ok(parsed.data);

  const issues = parsed.error.issues;
  const dimensionIssue = issues.some(
    (issue) => issue.path[0] === "width" || issue.path[0] === "height",
  );
  if (dimensionIssue) {
    return Err(MazeError.invalidDimension(config.width, config.height));
  }
  return Err(
    MazeError.configInvalid("Invalid maze configuration", {
      issues: issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    }),
  );
}

export function buildMazeConfig(
  input: BuildMazeConfigInput = {},
): Result<MazeConfig, MazeError> {
  return validateMazeConfig({
    width: input.width ?? MAZE_DEFAULTS.width,
    height: input.height ?? MAZE_DEFAULTS.height,
    seed: input.seed ?? MAZE_DEFAULTS.seed,
    algorithm: input.algorithm ?? MAZE_DEFAULTS.algorithm,
    goalInCenter: input.goalInCenter ?? MAZE_DEFAULTS.goalInCenter,
  });
}

/**
 * Build a config from MAZE_* environment variables over the defaults.
 *
 * @example
 * ```typescript
 * // MAZE_WIDTH=32 MAZE_ALGORITHM=kruskal
 * const config = mazeConfigFromEnv(process.env).getOrThrow();
 * ```
 */
export function mazeConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): Result<MazeConfig, MazeError> {
  const parsed = MazeEnvSchema.safeParse(env);
  if (!parsed.success) {
    return Err(
      MazeError.configInvalid("Invalid maze environment", {
        issues: parsed.error.issues.map((issue) => ({
          variable: issue.path.join("."),
          message: issue.message,
        })),
      }),
    );
  }

  const vars = parsed.data;
  return buildMazeConfig({
    width: vars.MAZE_WIDTH,
    height: vars.MAZE_HEIGHT,
    seed: vars.MAZE_SEED,
    algorithm: vars.MAZE_ALGORITHM,
    goalInCenter: vars.MAZE_GOAL_IN_CENTER,
  });
}
