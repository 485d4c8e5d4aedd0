export {
  type DeserializeOptions,
  deserializeMaze,
  type MazeState,
  mazeResultFromState,
  mazeStateFromResult,
  serializeMaze,
} from "./maze-file";
