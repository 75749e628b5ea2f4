/**
 * Seed normalisation.
 *
 * Generators are seeded from a single uint32. Numbers are truncated to
 * their low 32 bits; strings are hashed with DJB2 so a level name or share
 * code can stand in for a number.
 */

import { GenerationError } from "../types/error";

export type SeedInput = number | string;

/**
 * DJB2 hash of a string, as uint32
 */
export function hashSeedString(input: string): number {
  let hash = 5381;
  for (let i = 0; i < input.length; i++) {
    hash = ((hash << 5) + hash + input.charCodeAt(i)) >>> 0;
  }
  return hash;
}

/**
 * @throws {GenerationError} `SEED_INVALID` for an empty string or a
 *   non-finite number
 */
export function normalizeSeed(input: SeedInput): number {
  if (typeof input === "string") {
    if (input.length === 0) {
      throw GenerationError.seedInvalid("Seed string cannot be empty");
    }
    return hashSeedString(input);
  }
  if (!Number.isFinite(input)) {
    throw GenerationError.seedInvalid(`Seed must be finite, got ${input}`, {
      seed: input,
    });
  }
  return input >>> 0;
}
