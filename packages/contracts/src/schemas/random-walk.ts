import { z } from "zod";
import { SeedSchema } from "./seed";
import { dimension } from "./shared";

/** Never re-enter floor */
export const NO_INTERSECTION = 0;
/** Re-enter floor three times out of four */
export const BASIC_INTERSECTION = 0.75;
/** Always allowed to re-enter floor */
export const FULL_INTERSECTION = 1;
/** Step budget sentinel: walk until stuck */
export const UNLIMITED_STEPS = -1;

export const DEFAULT_RANDOM_WALK_CONFIG = {
  width: 100,
  height: 100,
} as const;

export const DEFAULT_CARVE_OPTIONS = {
  maxSteps: UNLIMITED_STEPS,
  intersectionAllowance: BASIC_INTERSECTION,
} as const;

export const RandomWalkConfigSchema = z.object({
  seed: SeedSchema,
  width: dimension("Width", DEFAULT_RANDOM_WALK_CONFIG.width),
  height: dimension("Height", DEFAULT_RANDOM_WALK_CONFIG.height),
});

export const CarveOptionsSchema = z.object({
  maxSteps: z
    .union([
      z.literal(UNLIMITED_STEPS),
      z
        .number()
        .int({ error: "maxSteps must be an integer" })
        .min(0, { error: "maxSteps must be non-negative or UNLIMITED_STEPS" }),
    ])
    .default(DEFAULT_CARVE_OPTIONS.maxSteps),
  intersectionAllowance: z
    .number()
    .min(0, { error: "intersectionAllowance must be in [0, 1]" })
    .max(1, { error: "intersectionAllowance must be in [0, 1]" })
    .default(DEFAULT_CARVE_OPTIONS.intersectionAllowance),
});

export type RandomWalkConfigInput = z.input<typeof RandomWalkConfigSchema>;
export type RandomWalkConfig = z.output<typeof RandomWalkConfigSchema>;
export type CarveOptionsInput = z.input<typeof CarveOptionsSchema>;
export type CarveOptions = z.output<typeof CarveOptionsSchema>;
