type Outcome<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/**
 * Result type for explicit, type-safe error handling.
 *
 * Factories that can reject their configuration return a `Result` instead of
 * throwing, so callers can branch without try/catch.
 *
 * @example
 * ```typescript
 * const walls = createRandomWalk({ seed: 7, width: 64, height: 48 })
 *   .tap((walk) => walk.carveFloor())
 *   .map((walk) => walk.markWalls())
 *   .getOrElse(0);
 * ```
 */
export class Result<T, E> {
  private constructor(private readonly outcome: Outcome<T, E>) {}

  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>({ ok: true, value });
  }

  static err<T = never, E = unknown>(error: E): Result<T, E> {
    return new Result<T, E>({ ok: false, error });
  }

  /**
   * Run `fn`, capturing a thrown error through `onError`.
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
    return this.outcome.ok;
  }

  isErr(): boolean {
    return !this.outcome.ok;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    const o = this.outcome;
    return o.ok ? Result.ok(fn(o.value)) : Result.err(o.error);
  }

  flatMap<U>(fn: (value: T) => Result<U, E>): Result<U, E> {
    const o = this.outcome;
    return o.ok ? fn(o.value) : Result.err(o.error);
  }

  getOrElse(defaultValue: T): T {
    const o = this.outcome;
    return o.ok ? o.value : defaultValue;
  }

  getOrThrow(): T {
    const o = this.outcome;
    if (o.ok) return o.value;
    throw o.error;
  }

  match<U>(onOk: (value: T) => U, onErr: (error: E) => U): U {
    const o = this.outcome;
    return o.ok ? onOk(o.value) : onErr(o.error);
  }

  tap(fn: (value: T) => void): Result<T, E> {
    if (this.outcome.ok) fn(this.outcome.value);
    return this;
  }

  tapErr(fn: (error: E) => void): Result<T, E> {
    if (!this.outcome.ok) fn(this.outcome.error);
    return this;
  }

  get value(): T {
    const o = this.outcome;
    if (!o.ok) {
      throw new Error("Cannot access value of Err Result");
    }
    return o.value;
  }

  get error(): E {
    const o = this.outcome;
    if (o.ok) {
      throw new Error("Cannot access error of Ok Result");
    }
    return o.error;
  }
}

export const Ok = Result.ok;
export const Err = Result.err;
