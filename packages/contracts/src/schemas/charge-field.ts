import { z } from "zod";
import { SeedSchema } from "./seed";
import { dimension } from "./shared";

export const DEFAULT_CHARGE_FIELD_CONFIG = {
  width: 1000,
  height: 1000,
  positiveCharges: 10,
  negativeCharges: 5,
  cutoffMultiplier: 1,
} as const;

const chargeCount = (label: string, fallback: number) =>
  z
    .number()
    .int({ error: `${label} must be an integer` })
    .min(0, { error: `${label} cannot be negative` })
    .default(fallback);

export const ChargeFieldConfigSchema = z
  .object({
    seed: SeedSchema,
    width: dimension("Width", DEFAULT_CHARGE_FIELD_CONFIG.width),
    height: dimension("Height", DEFAULT_CHARGE_FIELD_CONFIG.height),
    positiveCharges: chargeCount(
      "positiveCharges",
      DEFAULT_CHARGE_FIELD_CONFIG.positiveCharges,
    ),
    negativeCharges: chargeCount(
      "negativeCharges",
      DEFAULT_CHARGE_FIELD_CONFIG.negativeCharges,
    ),
    cutoffMultiplier: z
      .number()
      .default(DEFAULT_CHARGE_FIELD_CONFIG.cutoffMultiplier),
  })
  .superRefine((config, ctx) => {
    // charge strength divides by sqrt(total)
    if (config.positiveCharges + config.negativeCharges === 0) {
      ctx.addIssue({
        code: "custom",
        message: "At least one charge is required",
        path: ["positiveCharges"],
      });
    }
  });

export type ChargeFieldConfigInput = z.input<typeof ChargeFieldConfigSchema>;
export type ChargeFieldConfig = z.output<typeof ChargeFieldConfigSchema>;
