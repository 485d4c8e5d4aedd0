import { z } from "zod";
import { MAZE_ALGORITHMS } from "../types/maze";

const UINT32_MAX = 0xffffffff;

const DimensionSchema = z
  .number()
  .int("Dimension must be an integer")
  .positive("Dimension must be positive");

export const MazeSeedSchema = z
  .number()
  .int()
  .min(0, { error: "Seed must be a non-negative integer" })
  .max(UINT32_MAX, { error: "Seed must fit in uint32" });

export const MazeAlgorithmSchema = z.enum(MAZE_ALGORITHMS);

export const MazeConfigSchema = z.object({
  width: DimensionSchema,
  height: DimensionSchema,
  seed: MazeSeedSchema,
  algorithm: MazeAlgorithmSchema,
  goalInCenter: z.boolean(),
});

export type ValidatedMazeConfig = z.infer<typeof MazeConfigSchema>;

const BooleanFlagSchema = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

/**
 * Environment overrides for the default generation config.
 */
export const MazeEnvSchema = z.object({
  MAZE_WIDTH: z.coerce.number().pipe(DimensionSchema).optional(),
  MAZE_HEIGHT: z.coerce.number().pipe(DimensionSchema).optional(),
  MAZE_SEED: z.coerce.number().pipe(MazeSeedSchema).optional(),
  MAZE_ALGORITHM: MazeAlgorithmSchema.optional(),
  MAZE_GOAL_IN_CENTER: BooleanFlagSchema.optional(),
});

export type MazeEnv = z.infer<typeof MazeEnvSchema>;
