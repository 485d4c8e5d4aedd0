/**
 * Testing utilities for maze generation.
 * Kept apart from the validation module, which the API does not depend on.
 */

import { type MazeConfig, MazeError } from "@mazeworks/contracts";
import { generateMaze } from "./api";
import { calculateMazeChecksum } from "./core/hash";

// =============================================================================
// DETERMINISM TESTING
// =============================================================================

/**
 * Error thrown when determinism assertion fails
 */
export class DeterminismViolationError extends Error {
  constructor(
    public readonly checksums: string[],
    public readonly config: MazeConfig,
  ) {
    super(
      `Non-deterministic generation detected: produced ${checksums.length} different checksums for the same seed`,
    );
    this.name = "DeterminismViolationError";
  }
}

function collectChecksums(config: MazeConfig, runs: number): string[] {
  if (config.seed === 0) {
    throw MazeError.configInvalid(
      "Determinism checks need a non-zero seed",
      { seed: config.seed },
    );
  }

  const checksums: string[] = [];
  for (let i = 0; i < runs; i++) {
    const result = generateMaze(config);
    if (!result.success) {
      throw new Error(
        `Generation failed on run ${i + 1}: ${result.error.message}`,
      );
    }
    checksums.push(calculateMazeChecksum(result.value.grid));
  }
  return checksums;
}

/**
 * Assert that repeated generation with the same seed yields the same walls.
 *
 * @param runs - Number of generations to compare (default: 3)
 * @throws {DeterminismViolationError} If runs disagree
 * @throws {MazeError} CONFIG_INVALID for seed 0, which is random by contract
 *
 * @example
 * ```typescript
 * it("kruskal is deterministic", () => {
 *   assertDeterministic({ width: 20, height: 20, seed: 9, algorithm: "kruskal", goalInCenter: true });
 * });
 * ```
 */
export function assertDeterministic(config: MazeConfig, runs: number = 3): void {
  const uniqueChecksums = [...new Set(collectChecksums(config, runs))];
  if (uniqueChecksums.length > 1) {
    throw new DeterminismViolationError(uniqueChecksums, config);
  }
}

/**
 * Test determinism and return the checksums instead of throwing.
 */
export function testDeterminism(
  config: MazeConfig,
  runs: number = 3,
): {
  deterministic: boolean;
  checksums: string[];
  uniqueChecksums: string[];
} {
  const checksums = collectChecksums(config, runs);
  const uniqueChecksums = [...new Set(checksums)];
  return {
    deterministic: uniqueChecksums.length === 1,
    checksums,
    uniqueChecksums,
  };
}
