/**
 * Error codes for maze operations.
 */
export type MazeErrorCode =
  | "INVALID_DIMENSION"
  | "NOT_ADJACENT"
  | "CONFIG_INVALID"
  | "ALGORITHM_NOT_FOUND"
  | "PAYLOAD_MALFORMED"
  | "PAYLOAD_SHAPE_MISMATCH";

/**
 * Unified error type for maze generation, the wall grid and persistence.
 *
 * `NOT_ADJACENT` is raised by the grid when a generator asks for a wall
 * between cells that do not share an edge. It signals a generator bug and is
 * thrown rather than returned.
 *
 * @example
 * ```typescript
 * const error = MazeError.invalidDimension(0, 16);
 * error.code; // "INVALID_DIMENSION"
 * ```
 */
export class MazeError extends Error {
  override readonly name = "MazeError";

  constructor(
    public readonly code: MazeErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MazeError);
    }
  }

  static create(
    code: MazeErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ): MazeError {
    return new MazeError(code, message, details);
  }

  static invalidDimension(width: number, height: number): MazeError {
    return new MazeError(
      "INVALID_DIMENSION",
      `Invalid maze dimensions: ${width}x${height}`,
      { width, height },
    );
  }

  static configInvalid(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("CONFIG_INVALID", message, details);
  }

  static payloadMalformed(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("PAYLOAD_MALFORMED", message, details);
  }

  static isMazeError(error: unknown): error is MazeError {
    return error instanceof MazeError;
  }

  toJSON(): {
    name: string;
    code: MazeErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
