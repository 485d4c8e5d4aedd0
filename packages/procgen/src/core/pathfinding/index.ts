export { findPath, solveMaze } from "./maze-path";
