/**
 * Random source contract shared by every maze generator.
 *
 * Generators never reach for a global random stream: the caller owns the
 * RNG, seeds it once per generation call and hands it in.
 */
export interface Rng {
  /** Next double in [0, 1). */
  next(): number;
  /** Random integer between min and max (inclusive). */
  range(min: number, max: number): number;
  /** Fisher-Yates shuffle into a new array. */
  shuffle<T>(array: readonly T[]): T[];
}

/**
 * Random integer between min and max (inclusive)
 * @param rng - Random number generator function (returns 0 to 1)
 */
export function range(rng: () => number, min: number, max: number): number {
  return ~~(rng() * (max - min + 1)) + min;
}

/**
 * Fisher-Yates shuffle.
 *
 * Walks from the last index down to 1 and swaps each slot with a uniformly
 * random index in [0, i]. The iteration order is part of the seed contract:
 * changing it changes every Kruskal maze.
 *
 * @param rng - Random number generator function (returns 0 to 1)
 * @returns A new shuffled array
 */
export function shuffle<T>(rng: () => number, array: readonly T[]): T[] {
  const result: T[] = Array.from(array);
  for (let i = result.length - 1; i > 0; i--) {
    const j = range(rng, 0, i);
    const a = result[i];
    const b = result[j];
    if (a === undefined || b === undefined) continue;
    result[i] = b;
    result[j] = a;
  }
  return result;
}
