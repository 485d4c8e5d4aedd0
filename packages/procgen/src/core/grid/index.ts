/**
 * Grid module - the wall grid mazes are carved into.
 */

export * from "./types";
export { WallGrid } from "./wall-grid";
