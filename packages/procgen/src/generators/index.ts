/**
 * Generators module - the three map generation algorithms.
 */

export * from "./charge-field";
export * from "./random-walk";
export * from "./region-growth";
export type { GeneratorOptions, GridGenerator } from "./types";
