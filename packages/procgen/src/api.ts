/**
 * Generation API
 *
 * High-level API for maze generation.
 */

import {
  type BuildMazeConfigInput,
  buildMazeConfig,
  Err,
  type MazeAlgorithm,
  type MazeConfig,
  MazeError,
  Ok,
  type Result,
  type Rng,
  randomSeed,
  SeededRandom,
  validateMazeConfig,
} from "@mazeworks/contracts";
import { WallGrid } from "./core/grid";
import {
  createKruskalGenerator,
  createOpenGridGenerator,
  createPrimGenerator,
  type MazeGenerator,
} from "./generators";
import { computeStartGoal } from "./placement";
import type { MazeResult } from "./types";

/**
 * Generator registry
 */
const generators = new Map<MazeAlgorithm, MazeGenerator>([
  ["prim", createPrimGenerator()],
  ["kruskal", createKruskalGenerator()],
  ["custom", createOpenGridGenerator()],
]);

export interface GenerateOptions {
  /**
   * Seed the RNG was actually built from, recorded on the result.
   * Defaults to `config.seed`.
   */
  readonly resolvedSeed?: number;
}

/**
 * Generate a maze with a caller-owned RNG.
 *
 * The RNG must be seeded once by the caller before this call; see
 * {@link createMazeRng}. The config is validated before any grid exists.
 *
 * @example
 * ```typescript
 * const config = buildMazeConfig({ width: 8, height: 8, seed: 42 }).getOrThrow();
 * const result = generate(config, new SeededRandom(config.seed));
 * if (result.success) {
 *   console.log(result.value.goal);
 * }
 * ```
 */
export function generate(
  config: MazeConfig,
  rng: Rng,
  options: GenerateOptions = {},
): Result<MazeResult, MazeError> {
  const validated = validateMazeConfig(config);
  if (validated.isErr()) {
    return Err(validated.error);
  }

  const generator = generators.get(config.algorithm);
  if (!generator) {
    return Err(
      MazeError.create(
        "ALGORITHM_NOT_FOUND",
        `Unknown algorithm: ${config.algorithm}`,
        { algorithm: config.algorithm },
      ),
    );
  }

  const grid = new WallGrid(config.width, config.height);
  generator.carve(grid, rng);

  const { start, goal } = computeStartGoal(config);
  return Ok({
    config,
    seed: options.resolvedSeed ?? config.seed,
    grid,
    start,
    goal,
  });
}

/**
 * Seed an RNG for one generation call.
 *
 * Seed 0 draws a fresh seed from system randomness, so two calls give
 * different mazes; any other seed is used as is.
 */
export function createMazeRng(seed: number): { seed: number; rng: Rng } {
  const resolved = seed === 0 ? randomSeed() : seed;
  return { seed: resolved, rng: new SeededRandom(resolved) };
}

/**
 * Fill config defaults, seed an RNG and generate.
 *
 * @example
 * ```typescript
 * const maze = generateMaze({ width: 16, height: 16, seed: 7, algorithm: "kruskal" });
 * ```
 */
export function generateMaze(
  input: BuildMazeConfigInput = {},
): Result<MazeResult, MazeError> {
  return buildMazeConfig(input).flatMap((config) => {
    const { seed, rng } = createMazeRng(config.seed);
    return generate(config, rng, { resolvedSeed: seed });
  });
}

/**
 * Get registered algorithm ids
 */
export function getAvailableAlgorithms(): MazeAlgorithm[] {
  return [...generators.keys()];
}

export function getGenerator(algorithm: MazeAlgorithm): MazeGenerator | undefined {
  return generators.get(algorithm);
}

/**
 * Register a generator under its id, replacing the current one.
 * @returns The generator previously registered under that id
 */
export function registerGenerator(
  generator: MazeGenerator,
): MazeGenerator | undefined {
  const previous = generators.get(generator.id);
  generators.set(generator.id, generator);
  return previous;
}
