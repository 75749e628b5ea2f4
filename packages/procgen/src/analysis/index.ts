export * from "./adjacency";
export * from "./landmasses";
