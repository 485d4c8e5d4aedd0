export { enumerateWallEdges, expectedEdgeCount, type WallEdge } from "./edges";
export { createKruskalGenerator, KruskalGenerator } from "./generator";
