/**
 * Generation API tests
 */

import {
  buildMazeConfig,
  type MazeConfig,
  MazeError,
  SeededRandom,
} from "@mazeworks/contracts";
import { describe, expect, it } from "vitest";
import {
  createMazeRng,
  generate,
  generateMaze,
  getAvailableAlgorithms,
  getGenerator,
  registerGenerator,
} from "../src/api";
import { createKruskalGenerator } from "../src/generators";
import { validateMaze } from "../src/validation";
import { createFirstPickRng } from "./support/rng";

function config(overrides: Partial<MazeConfig> = {}): MazeConfig {
  return buildMazeConfig({ seed: 42, ...overrides }).getOrThrow();
}

describe("generate", () => {
  it("carves with the caller's rng and reports start and goal", () => {
    const result = generate(config({ width: 8, height: 8 }), new SeededRandom(42));

    expect(result.success).toBe(true);
    const maze = result.value;
    expect(maze.seed).toBe(42);
    expect(maze.start).toEqual({ x: 0, y: 0 });
    expect(maze.goal).toEqual({ x: 3, y: 3 });
    expect(validateMaze(maze.grid).perfect).toBe(true);
  });

  it("matches generateMaze for the same seed", () => {
    const direct = generate(config({ width: 10, height: 6 }), new SeededRandom(42));
    const wrapped = generateMaze({ width: 10, height: 6, seed: 42 });
    expect(direct.value.grid.equals(wrapped.value.grid)).toBe(true);
  });

  it("rejects bad dimensions before touching the rng", () => {
    const rng = createFirstPickRng();
    const result = generate({ ...config(), width: 0 }, rng);

    expect(result.isErr()).toBe(true);
    expect(result.error.code).toBe("INVALID_DIMENSION");
    expect(rng.calls).toBe(0);
  });

  it("records the resolved seed when given one", () => {
    const result = generate(config({ seed: 0 }), new SeededRandom(99), {
      resolvedSeed: 99,
    });
    expect(result.value.seed).toBe(99);
  });
});

describe("generateMaze", () => {
  it("fills defaults", () => {
    const maze = generateMaze({ seed: 5 }).getOrThrow();
    expect(maze.config).toEqual({
      width: 16,
      height: 16,
      seed: 5,
      algorithm: "prim",
      goalInCenter: true,
    });
    expect(maze.goal).toEqual({ x: 7, y: 7 });
  });

  it.each(["prim", "kruskal"] as const)("%s is deterministic for a fixed seed", (algorithm) => {
    const a = generateMaze({ width: 12, height: 9, seed: 7, algorithm }).getOrThrow();
    const b = generateMaze({ width: 12, height: 9, seed: 7, algorithm }).getOrThrow();
    expect(a.grid.equals(b.grid)).toBe(true);
  });

  it("gives different mazes for different seeds", () => {
    const a = generateMaze({ width: 12, height: 12, seed: 1 }).getOrThrow();
    const b = generateMaze({ width: 12, height: 12, seed: 2 }).getOrThrow();
    expect(a.grid.equals(b.grid)).toBe(false);
  });

  it("gives prim and kruskal different mazes for the same seed", () => {
    const prim = generateMaze({ width: 12, height: 12, seed: 3, algorithm: "prim" }).getOrThrow();
    const kruskal = generateMaze({ width: 12, height: 12, seed: 3, algorithm: "kruskal" }).getOrThrow();
    expect(prim.grid.equals(kruskal.grid)).toBe(false);
  });

  it("resolves seed 0 to a random non-zero seed", () => {
    const maze = generateMaze({ width: 6, height: 6, seed: 0 }).getOrThrow();
    expect(maze.config.seed).toBe(0);
    expect(maze.seed).not.toBe(0);
    expect(validateMaze(maze.grid).perfect).toBe(true);

    const replay = generateMaze({ width: 6, height: 6, seed: maze.seed }).getOrThrow();
    expect(replay.grid.equals(maze.grid)).toBe(true);
  });

  it("handles a single cell", () => {
    for (const goalInCenter of [true, false]) {
      const maze = generateMaze({ width: 1, height: 1, seed: 1, goalInCenter }).getOrThrow();
      expect(maze.grid.openPassageCount()).toBe(0);
      expect(maze.start).toEqual({ x: 0, y: 0 });
      expect(maze.goal).toEqual({ x: 0, y: 0 });
    }
  });

  it("returns INVALID_DIMENSION for zero or negative sizes", () => {
    for (const size of [{ width: 0 }, { height: -3 }]) {
      const result = generateMaze({ seed: 1, ...size });
      expect(result.isErr()).toBe(true);
      expect(result.error).toBeInstanceOf(MazeError);
      expect(result.error.code).toBe("INVALID_DIMENSION");
    }
  });

  it("returns CONFIG_INVALID for a negative seed", () => {
    const result = generateMaze({ seed: -1 });
    expect(result.error.code).toBe("CONFIG_INVALID");
  });

  it("opens every interior wall for custom", () => {
    const maze = generateMaze({ width: 4, height: 4, seed: 1, algorithm: "custom" }).getOrThrow();
    expect(maze.grid.openPassageCount()).toBe(24);
  });
});

describe("createMazeRng", () => {
  it("keeps a non-zero seed", () => {
    const { seed, rng } = createMazeRng(42);
    expect(seed).toBe(42);
    expect(rng.next()).toBe(new SeededRandom(42).next());
  });

  it("replaces seed 0", () => {
    expect(createMazeRng(0).seed).not.toBe(0);
  });
});

describe("generator registry", () => {
  it("lists the built-in algorithms", () => {
    expect(getAvailableAlgorithms()).toEqual(["prim", "kruskal", "custom"]);
    expect(getGenerator("kruskal")?.name).toBe("Kruskal");
  });

  it("lets custom be replaced and restored", () => {
    const kruskal = createKruskalGenerator();
    const previous = registerGenerator({
      id: "custom",
      name: "Kruskal under custom",
      description: "Test stand-in",
      perfect: true,
      carve: (grid, rng) => kruskal.carve(grid, rng),
    });

    try {
      expect(previous?.name).toBe("Open grid");
      const maze = generateMaze({ width: 8, height: 8, seed: 11, algorithm: "custom" }).getOrThrow();
      const expected = generateMaze({ width: 8, height: 8, seed: 11, algorithm: "kruskal" }).getOrThrow();
      expect(maze.grid.equals(expected.grid)).toBe(true);
    } finally {
      if (previous) registerGenerator(previous);
    }

    expect(getGenerator("custom")?.name).toBe("Open grid");
  });
});
