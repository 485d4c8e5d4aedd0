/**
 * Geometry module - points, segments and direction vectors.
 */

export * from "./types";
