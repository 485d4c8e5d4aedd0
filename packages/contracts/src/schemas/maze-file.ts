import { z } from "zod";
import { MAZE_ALGORITHMS } from "../types/maze";
import { MazeSeedSchema } from "./maze";

const WallRowsSchema = z.array(z.array(z.boolean()));

/**
 * Persisted maze record.
 *
 * Keys are the on-disk names. Missing fields take the defaults below; the
 * algorithm may be stored by name or by ordinal (0 prim, 1 kruskal, 2 custom).
 * Wall array shape is not checked here, the loader decides how to treat it.
 */
export const MazeFileSchema = z.object({
  width: z.number().int().positive().default(16),
  height: z.number().int().positive().default(16),
  seed: MazeSeedSchema.default(0),
  algorithm: z
    .union([
      z.enum(MAZE_ALGORITHMS),
      z
        .number()
        .int()
        .min(0)
        .max(MAZE_ALGORITHMS.length - 1),
    ])
    .default("prim"),
  goal_in_center: z.boolean().default(true),
  vertical_walls: WallRowsSchema.default([]),
  horizontal_walls: WallRowsSchema.default([]),
});

export type MazeFileRecord = z.infer<typeof MazeFileSchema>;
