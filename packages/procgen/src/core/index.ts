/**
 * Core module - foundational primitives for maze generation.
 */

export * from "./algorithms";
export * from "./geometry";
export * from "./graph";
export * from "./grid";
export * from "./hash";
export * from "./pathfinding";
