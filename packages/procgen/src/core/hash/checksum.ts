/**
 * Maze Checksum Calculator
 *
 * Deterministic fingerprint of a wall grid, used to compare generations
 * across runs. Format: "v{version}:{crc32 as 8 hex digits}".
 *
 * Version history:
 * - v1: dimensions + bit-packed vertical and horizontal wall layers
 */

import { bitPack01, crc32 } from "@mazeworks/contracts";
import type { ReadonlyWallGrid } from "../grid";

export const CHECKSUM_VERSION = 1;

/**
 * Split a checksum into version and hash. Null if the format is unknown.
 */
export function parseChecksum(checksum: string): {
  version: number;
  hash: string;
} | null {
  const match = checksum.match(/^v(\d+):([0-9a-f]{8})$/);
  if (!match || !match[1] || !match[2]) return null;
  return {
    version: parseInt(match[1], 10),
    hash: match[2],
  };
}

/**
 * Compare two checksums. Different versions never match.
 */
export function checksumsAreCompatible(a: string, b: string): boolean {
  const parsedA = parseChecksum(a);
  const parsedB = parseChecksum(b);

  if (!parsedA || !parsedB) {
    console.warn("[Checksum] Cannot compare malformed checksums");
    return false;
  }
  if (parsedA.version !== parsedB.version) {
    console.warn(
      `[Checksum] Version mismatch: v${parsedA.version} vs v${parsedB.version}`,
    );
    return false;
  }
  return parsedA.hash === parsedB.hash;
}

export function calculateMazeChecksum(grid: ReadonlyWallGrid): string {
  const { vertical, horizontal } = grid.getRawWallData();
  const packedVertical = bitPack01(vertical);
  const packedHorizontal = bitPack01(horizontal);

  const bytes = new Uint8Array(8 + packedVertical.length + packedHorizontal.length);
  const view = new DataView(bytes.buffer);
  view.setUint32(0, grid.width, true);
  view.setUint32(4, grid.height, true);
  bytes.set(packedVertical, 8);
  bytes.set(packedHorizontal, 8 + packedVertical.length);

  const hash = crc32(bytes).toString(16).padStart(8, "0");
  return `v${CHECKSUM_VERSION}:${hash}`;
}
