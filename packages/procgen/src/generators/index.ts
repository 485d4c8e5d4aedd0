/**
 * Generators module - maze carving algorithms.
 */

// Open grid placeholder registered as "custom"
export { createOpenGridGenerator, OpenGridGenerator } from "./custom";

// Kruskal - shuffled walls over a union-find forest
export {
  createKruskalGenerator,
  enumerateWallEdges,
  expectedEdgeCount,
  KruskalGenerator,
  type WallEdge,
} from "./kruskal";

// Randomized Prim - uniform random frontier
export { createPrimGenerator, PrimGenerator } from "./prim";

export type { MazeGenerator } from "./types";
