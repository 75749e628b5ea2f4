export * from "./random/rng";
export * from "./random/seeded-random";
export * from "./schemas/charge-field";
export * from "./schemas/random-walk";
export * from "./schemas/region-growth";
export * from "./schemas/seed";
export * from "./schemas/shared";
export * from "./types/error";
export * from "./types/result";
export * from "./utils/seed";
