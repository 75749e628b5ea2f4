import { z } from "zod";
import { SeedSchema } from "./seed";
import { dimension } from "./shared";

export const DEFAULT_REGION_GROWTH_CONFIG = {
  width: 200,
  height: 200,
  seedCount: 10,
} as const;

const OriginSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
});

/**
 * Region growth configuration.
 *
 * `origins` replaces the random origin draw. When present, `seedCount`
 * defaults to its length and must match it if given.
 */
export const RegionGrowthConfigSchema = z
  .object({
    seed: SeedSchema,
    width: dimension("Width", DEFAULT_REGION_GROWTH_CONFIG.width),
    height: dimension("Height", DEFAULT_REGION_GROWTH_CONFIG.height),
    seedCount: z
      .number()
      .int({ error: "seedCount must be an integer" })
      .min(1, { error: "seedCount must be at least 1" })
      .optional(),
    origins: z
      .array(OriginSchema)
      .min(1, { error: "origins cannot be empty" })
      .optional(),
  })
  .superRefine((config, ctx) => {
    const { origins } = config;
    if (!origins) return;

    if (config.seedCount !== undefined && config.seedCount !== origins.length) {
      ctx.addIssue({
        code: "custom",
        message: `seedCount (${config.seedCount}) does not match origins (${origins.length})`,
        path: ["seedCount"],
      });
    }

    origins.forEach((origin, index) => {
      if (
        origin.x < 0 ||
        origin.x >= config.width ||
        origin.y < 0 ||
        origin.y >= config.height
      ) {
        ctx.addIssue({
          code: "custom",
          message: `Origin (${origin.x}, ${origin.y}) is outside the ${config.width}x${config.height} grid`,
          path: ["origins", index],
        });
      }
    });
  })
  .transform((config) => ({
    seed: config.seed,
    width: config.width,
    height: config.height,
    seedCount:
      config.origins?.length ??
      config.seedCount ??
      DEFAULT_REGION_GROWTH_CONFIG.seedCount,
    origins: config.origins,
  }));

export type RegionGrowthConfigInput = z.input<typeof RegionGrowthConfigSchema>;
export type RegionGrowthConfig = z.output<typeof RegionGrowthConfigSchema>;
