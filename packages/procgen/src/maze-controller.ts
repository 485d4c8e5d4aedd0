/**
 * Maze Controller
 *
 * Owns the current maze for an application and swaps it out wholesale on
 * regenerate or load. Configuration is passed in as a value on every call;
 * nothing regenerates implicitly.
 */

import {
  type BuildMazeConfigInput,
  MAZE_DEFAULTS,
  MazeError,
  type Result,
} from "@mazeworks/contracts";
import { generateMaze } from "./api";
import type { Point, WorldPosition } from "./core/geometry";
import {
  type DeserializeOptions,
  deserializeMaze,
  mazeResultFromState,
  mazeStateFromResult,
  serializeMaze,
} from "./serialization";
import type { MazeResult } from "./types";
import { cellContaining, goalWorldPosition, startWorldPosition } from "./world";

export interface MazeControllerOptions {
  /** World units per cell edge (default 1) */
  readonly cellSize?: number;
}

export class MazeController {
  readonly cellSize: number;
  private maze: MazeResult | undefined;

  constructor(options: MazeControllerOptions = {}) {
    const cellSize = options.cellSize ?? MAZE_DEFAULTS.cellSize;
    if (!(cellSize > 0) || !Number.isFinite(cellSize)) {
      throw MazeError.configInvalid("Cell size must be a positive finite number", {
        cellSize,
      });
    }
    this.cellSize = cellSize;
  }

  get current(): MazeResult | undefined {
    return this.maze;
  }

  /**
   * Generate a new maze and make it current. On failure the current maze
   * is kept.
   */
  regenerate(config: BuildMazeConfigInput = {}): Result<MazeResult, MazeError> {
    return generateMaze(config).tap((maze) => {
      this.maze = maze;
    });
  }

  /**
   * Replace the current maze with a saved one. On failure the current maze
   * is kept.
   */
  load(
    text: string,
    options?: DeserializeOptions,
  ): Result<MazeResult, MazeError> {
    return deserializeMaze(text, options)
      .flatMap(mazeResultFromState)
      .tap((maze) => {
        this.maze = maze;
      });
  }

  /**
   * Serialized current maze, or undefined before the first regenerate/load.
   */
  save(): string | undefined {
    return this.maze ? serializeMaze(mazeStateFromResult(this.maze)) : undefined;
  }

  startWorldPosition(): WorldPosition | undefined {
    return this.maze ? startWorldPosition(this.maze, this.cellSize) : undefined;
  }

  goalWorldPosition(): WorldPosition | undefined {
    return this.maze ? goalWorldPosition(this.maze, this.cellSize) : undefined;
  }

  cellContaining(position: WorldPosition): Point | undefined {
    return this.maze
      ? cellContaining(this.maze, position, this.cellSize)
      : undefined;
  }
}
