/**
 * Procedural map generation for 2D tile-based games.
 *
 * Three independent, seeded generators, each owning a grid exposed
 * read-only:
 *
 * - `ChargeFieldGenerator`: landmasses from a field of point charges
 * - `RandomWalkGenerator`: corridors carved by a wandering cursor
 * - `RegionGrowthGenerator`: Voronoi-like partition grown from seed points
 *
 * @example
 * ```typescript
 * import { generate, renderRegionsAscii } from "@tilegen/procgen";
 *
 * const result = generate({
 *   algorithm: "region-growth",
 *   config: { seed: 12345, width: 60, height: 30, seedCount: 6 },
 * });
 *
 * if (result.isOk()) {
 *   console.log(renderRegionsAscii(result.value.grid));
 * }
 * ```
 */

export * from "./analysis";
export * from "./api";
export * from "./core";
export * from "./generators";
export * from "./trace";
export * from "./utils";
export {
  GenerationError,
  type GenerationErrorCode,
  SeededRandom,
} from "@tilegen/contracts";
