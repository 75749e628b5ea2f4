import { z } from "zod";
import { normalizeSeed } from "../utils/seed";

/**
 * Any safe integer; `normalizeSeed` keeps its low 32 bits.
 */
export const NumericSeedSchema = z
  .number()
  .int({ error: "Seed must be an integer" });

export const StringSeedSchema = z
  .string()
  .min(1, { error: "Seed string cannot be empty" });

/**
 * Accepts an integer or a non-empty string and resolves to a uint32.
 */
export const SeedSchema = z
  .union([NumericSeedSchema, StringSeedSchema])
  .transform((seed) => normalizeSeed(seed));
