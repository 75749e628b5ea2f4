/**
 * Core modules shared by the generators.
 */

export * from "./data-structures";
export * from "./geometry";
export * from "./grid";
export * from "./hash";
