export { type BFSDistanceResult, calculateBFSDistances } from "./bfs-distance";
