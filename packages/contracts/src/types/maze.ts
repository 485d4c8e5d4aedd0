export const MAZE_ALGORITHMS = ["prim", "kruskal", "custom"] as const;

export type MazeAlgorithm = (typeof MAZE_ALGORITHMS)[number];

export interface MazeConfig {
  readonly width: number;
  readonly height: number;
  /** 0 asks for a fresh nondeterministic seed on every run. */
  readonly seed: number;
  readonly algorithm: MazeAlgorithm;
  readonly goalInCenter: boolean;
}
