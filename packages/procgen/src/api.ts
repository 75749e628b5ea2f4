/**
 * Generation API
 *
 * `Result`-returning entry points. Constructors throw on bad configuration;
 * these wrap them so callers can branch on the error instead.
 */

import {
  type CarveOptionsInput,
  type ChargeFieldConfigInput,
  Err,
  GenerationError,
  type RandomWalkConfigInput,
  type RegionGrowthConfigInput,
  Result,
} from "@tilegen/contracts";
import { ChargeFieldGenerator } from "./generators/charge-field";
import {
  generateRandomWalkMap,
  RandomWalkGenerator,
} from "./generators/random-walk";
import { RegionGrowthGenerator } from "./generators/region-growth";
import type { GeneratorOptions, GridGenerator } from "./generators/types";

function toGenerationError(error: unknown): GenerationError {
  if (GenerationError.isGenerationError(error)) return error;
  return GenerationError.generationFailed(
    error instanceof Error ? error.message : String(error),
    { cause: error },
  );
}

export function createChargeField(
  config: ChargeFieldConfigInput,
  options: GeneratorOptions = {},
): Result<ChargeFieldGenerator, GenerationError> {
  return Result.fromThrowable(
    () => new ChargeFieldGenerator(config, options),
    toGenerationError,
  );
}

/**
 * Random walk with nothing carved yet
 */
export function createRandomWalk(
  config: RandomWalkConfigInput,
  options: GeneratorOptions = {},
): Result<RandomWalkGenerator, GenerationError> {
  return Result.fromThrowable(
    () => new RandomWalkGenerator(config, options),
    toGenerationError,
  );
}

export function createRegionGrowth(
  config: RegionGrowthConfigInput,
  options: GeneratorOptions = {},
): Result<RegionGrowthGenerator, GenerationError> {
  return Result.fromThrowable(
    () => new RegionGrowthGenerator(config, options),
    toGenerationError,
  );
}

/**
 * Generation request, tagged by algorithm
 */
export type GenerationRequest =
  | { readonly algorithm: "charge-field"; readonly config: ChargeFieldConfigInput }
  | {
      readonly algorithm: "random-walk";
      readonly config: RandomWalkConfigInput & CarveOptionsInput;
    }
  | {
      readonly algorithm: "region-growth";
      readonly config: RegionGrowthConfigInput;
    };

export type GenerationAlgorithm = GenerationRequest["algorithm"];

export const GENERATION_ALGORITHMS: readonly GenerationAlgorithm[] = [
  "charge-field",
  "random-walk",
  "region-growth",
];

/**
 * Run any generator to completion. Random walks are carved once and walled.
 *
 * @example
 * ```typescript
 * const result = generate({
 *   algorithm: "region-growth",
 *   config: { seed: 12345, width: 120, height: 90, seedCount: 8 },
 * });
 *
 * if (result.isOk()) {
 *   console.log(result.value.checksum());
 * }
 * ```
 */
export function generate(
  request: GenerationRequest,
  options: GeneratorOptions = {},
): Result<GridGenerator, GenerationError> {
  switch (request.algorithm) {
    case "charge-field":
      return createChargeField(request.config, options);
    case "random-walk":
      return Result.fromThrowable(
        () => generateRandomWalkMap(request.config, options),
        toGenerationError,
      );
    case "region-growth":
      return createRegionGrowth(request.config, options);
    default:
      return Err(
        GenerationError.configInvalid("Unknown generation algorithm", {
          request,
        }),
      );
  }
}
