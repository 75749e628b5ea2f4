/**
 * Error codes for map generation.
 */
export type GenerationErrorCode =
  | "CONFIG_INVALID"
  | "SEED_INVALID"
  | "GENERATION_FAILED";

/**
 * Error raised (or carried in an `Err` result) by every generator.
 *
 * `CONFIG_INVALID` is raised before any grid is allocated; a generator that
 * passed validation cannot fail afterwards.
 *
 * @example
 * ```typescript
 * throw GenerationError.configInvalid("Charge count must be positive", {
 *   positiveCharges: 0,
 *   negativeCharges: 0,
 * });
 * ```
 */
export class GenerationError extends Error {
  override readonly name = "GenerationError";

  constructor(
    public readonly code: GenerationErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GenerationError);
    }
  }

  static configInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): GenerationError {
    return new GenerationError("CONFIG_INVALID", message, details);
  }

  static seedInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): GenerationError {
    return new GenerationError("SEED_INVALID", message, details);
  }

  static generationFailed(
    message: string,
    details?: Record<string, unknown>,
  ): GenerationError {
    return new GenerationError("GENERATION_FAILED", message, details);
  }

  static isGenerationError(error: unknown): error is GenerationError {
    return error instanceof GenerationError;
  }
}
