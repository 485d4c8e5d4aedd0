export {
  type MazeValidationResult,
  type MazeViolation,
  validateMaze,
} from "./validate-maze";
