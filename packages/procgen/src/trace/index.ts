export * from "./collector";
export type * from "./types";
