import { describe, expect, it } from "vitest";
import { MazeConfigSchema, MazeFileSchema } from "../src";

describe("MazeConfigSchema", () => {
  it("accepts a valid config", () => {
    const res = MazeConfigSchema.safeParse({
      width: 16,
      height: 16,
      seed: 42,
      algorithm: "prim",
      goalInCenter: true,
    });
    expect(res.success).toBe(true);
  });

  it("rejects seeds beyond uint32", () => {
    const res = MazeConfigSchema.safeParse({
      width: 16,
      height: 16,
      seed: 0x100000000,
      algorithm: "prim",
      goalInCenter: true,
    });
    expect(res.success).toBe(false);
  });

  it("rejects unknown algorithms", () => {
    const res = MazeConfigSchema.safeParse({
      width: 16,
      height: 16,
      seed: 1,
      algorithm: "eller",
      goalInCenter: true,
    });
    expect(res.success).toBe(false);
  });
});

describe("MazeFileSchema", () => {
  it("fills defaults for an empty record", () => {
    const res = MazeFileSchema.safeParse({});
    if (!res.success) throw new Error("unexpected error");
    expect(res.data).toEqual({
      width: 16,
      height: 16,
      seed: 0,
      algorithm: "prim",
      goal_in_center: true,
      vertical_walls: [],
      horizontal_walls: [],
    });
  });

  it("accepts the algorithm as an ordinal", () => {
    const res = MazeFileSchema.safeParse({ algorithm: 1 });
    if (!res.success) throw new Error("unexpected error");
    expect(res.data.algorithm).toBe(1);
  });

  it("rejects an out-of-range ordinal", () => {
    expect(MazeFileSchema.safeParse({ algorithm: 3 }).success).toBe(false);
  });

  it("rejects non-boolean wall entries", () => {
    const res = MazeFileSchema.safeParse({ vertical_walls: [[1, 0]] });
    expect(res.success).toBe(false);
  });
});
