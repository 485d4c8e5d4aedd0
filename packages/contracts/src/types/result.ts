/**
 * A Result type for explicit, type-safe error handling.
 *
 * @example
 * ```typescript
 * const maze = buildMazeConfig(input)
 *   .flatMap((config) => generateMaze(config))
 *   .getOrThrow();
 * ```
 */
export class Result<T, E> {
  private constructor(
    private readonly _value: T | undefined,
    private readonly _error: E | undefined,
    private readonly _isOk: boolean,
  ) {}

  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>(value, undefined, true);
  }

  static err<T = never, E = unknown>(error: E): Result<T, E> {
    return new Result<T, E>(undefined, error, false);
  }

  /**
   * Run a function that might throw, mapping the thrown value to E.
   */
  static fromThrowable<T, E>(
    fn: () => T,
    onError: (e: unknown) => E,
  ): Result<T, E> {
    try {
      return Result.ok(fn());
    } catch (e) {
      return Result.err(onError(e));
    }
  }

  isOk(): boolean {
    return this._isOk;
  }

  isErr(): boolean {
    return !this._isOk;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    if (this._isOk) {
      return Result.ok(fn(this._value as T));
    }
    return Result.err(this._error as E);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    if (this._isOk) {
      return Result.ok(this._value as T);
    }
    return Result.err(fn(this._error as E));
  }

  flatMap<U>(fn: (value: T) => Result<U, E>): Result<U, E> {
    if (this._isOk) {
      return fn(this._value as T);
    }
    return Result.err(this._error as E);
  }

  getOrElse(defaultValue: T): T {
    return this._isOk ? (this._value as T) : defaultValue;
  }

  getOrThrow(): T {
    if (this._isOk) {
      return this._value as T;
    }
    throw this._error;
  }

  match<U>(onOk: (value: T) => U, onErr: (error: E) => U): U {
    return this._isOk ? onOk(this._value as T) : onErr(this._error as E);
  }

  tap(fn: (value: T) => void): Result<T, E> {
    if (this._isOk) {
      fn(this._value as T);
    }
    return this;
  }

  get success(): boolean {
    return this._isOk;
  }

  get value(): T {
    if (!this._isOk) {
      throw new Error("Cannot access value of Err Result");
    }
    return this._value as T;
  }

  get error(): E {
    if (this._isOk) {
      throw new Error("Cannot access error of Ok Result");
    }
    return this._error as E;
  }
}

export const Ok = Result.ok;
export const Err = Result.err;
