export {
  CHECKSUM_VERSION,
  calculateMazeChecksum,
  checksumsAreCompatible,
  parseChecksum,
} from "./checksum";
