export {
  type AsciiCharset,
  DEFAULT_CHARSET,
  printMaze,
  type RenderableMaze,
  type RenderOptions,
  renderAscii,
} from "./ascii-renderer";
